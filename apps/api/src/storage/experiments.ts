/**
 * Experiment Repository
 *
 * Persists completed experiments (with their full step history) to
 * data/experiments.json.
 */

import {
  ExperimentResultSchema,
  type ExperimentMode,
  type ExperimentResult,
} from "../schemas/index.js";
import { BaseRepository, getCollectionPath } from "./base.js";

export class ExperimentRepository extends BaseRepository<ExperimentResult> {
  constructor(filePath: string = getCollectionPath("experiments")) {
    super({
      filePath,
      schema: ExperimentResultSchema,
      idField: "experiment_id",
    });
  }

  async save(result: ExperimentResult): Promise<ExperimentResult> {
    return this._set(result);
  }

  async findByMode(mode: ExperimentMode): Promise<ExperimentResult[]> {
    return this.list((e) => e.mode === mode);
  }

  /**
   * Most recently created experiment, if any
   */
  async latest(): Promise<ExperimentResult | undefined> {
    const all = await this.list();
    return all.reduce<ExperimentResult | undefined>(
      (newest, e) => (!newest || e.created_at > newest.created_at ? e : newest),
      undefined
    );
  }
}

let instance: ExperimentRepository | null = null;

export function getExperimentRepository(): ExperimentRepository {
  if (!instance) {
    instance = new ExperimentRepository();
  }
  return instance;
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ExperimentResult } from "../schemas/index.js";
import { buildExperimentResult } from "../services/simulation/results.js";
import { ExperimentRepository, getExperimentRepository } from "./experiments.js";

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "experiments-"));
  filePath = join(dir, "nested", "experiments.json");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function makeResult(mode: ExperimentResult["mode"], createdAt: string): ExperimentResult {
  return {
    ...buildExperimentResult(mode, 1, ["RandomChoice"], [
      { policy: "RandomChoice", step: 0, choice: "A", score: 4 },
    ]),
    created_at: createdAt,
  };
}

describe("ExperimentRepository", () => {
  it("starts empty when the file does not exist", async () => {
    const repository = new ExperimentRepository(filePath);
    expect(await repository.list()).toEqual([]);
    expect(await repository.latest()).toBeUndefined();
  });

  it("persists saved results across instances", async () => {
    const result = makeResult("independent", "2024-03-01T10:00:00.000Z");
    await new ExperimentRepository(filePath).save(result);

    const reopened = new ExperimentRepository(filePath);

    expect(await reopened.get(result.experiment_id)).toEqual(result);
    expect(await reopened.count()).toBe(1);
    expect(JSON.parse(await readFile(filePath, "utf-8"))).toEqual([result]);
  });

  it("filters by mode and finds the newest result", async () => {
    const repository = new ExperimentRepository(filePath);
    const older = makeResult("synchronized", "2024-03-01T10:00:00.000Z");
    const newer = makeResult("independent", "2024-03-02T10:00:00.000Z");
    await repository.save(newer);
    await repository.save(older);

    expect(await repository.findByMode("synchronized")).toEqual([older]);
    expect(await repository.latest()).toEqual(newer);
  });

  it("rejects a result that fails validation", async () => {
    const repository = new ExperimentRepository(filePath);
    const invalid = { ...makeResult("independent", "2024-03-01T10:00:00.000Z"), num_steps: -1 };

    await expect(repository.save(invalid)).rejects.toThrow();
    expect(await repository.count()).toBe(0);
  });

  it("refuses to load a corrupted collection", async () => {
    const path = join(dir, "experiments.json");
    await writeFile(path, JSON.stringify([{ experiment_id: "not-a-uuid" }]), "utf-8");

    await expect(new ExperimentRepository(path).list()).rejects.toThrow(
      `Schema validation failed loading ${path}`
    );
  });

  it("shares one default repository under the data directory", () => {
    const repository = getExperimentRepository();
    expect(getExperimentRepository()).toBe(repository);
    expect(repository.filePath.endsWith(join("data", "experiments.json"))).toBe(true);
  });
});

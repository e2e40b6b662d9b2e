/**
 * Review Loader
 *
 * Reads review rows from a JSON array on disk and validates each row.
 * Rows whose review text is blank are dropped before sampling.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { FeedbackRecordSchema, type FeedbackRecord } from "../schemas/index.js";
import { getCollectionPath } from "./base.js";

export function getDefaultReviewsPath(): string {
  return getCollectionPath("reviews");
}

export async function loadReviews(filePath: string = getDefaultReviewsPath()): Promise<FeedbackRecord[]> {
  const content = await readFile(filePath, "utf-8");

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Reviews file ${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = z.array(FeedbackRecordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Schema validation failed loading ${filePath}: ${parsed.error.message}`);
  }

  const records = parsed.data.filter((record) => record.Review.trim().length > 0);
  const dropped = parsed.data.length - records.length;
  if (dropped > 0) {
    console.warn(`[Reviews] Dropped ${dropped} row(s) with empty review text from ${filePath}`);
  }

  console.log(`[Reviews] Loaded ${records.length} reviews from ${filePath}`);
  return records;
}

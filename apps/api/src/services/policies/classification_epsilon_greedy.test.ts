import { describe, it, expect, vi } from "vitest";
import { ClassificationError, PolicyConfigError, UnknownArmError } from "../errors.js";
import type { ReviewClassifier } from "../oracle/types.js";
import { ClassificationEpsilonGreedy } from "./classification_epsilon_greedy.js";

/** Labels a review Good when it mentions "good". */
function keywordClassifier() {
  return {
    classify: vi.fn<ReviewClassifier["classify"]>(async (text) =>
      text.includes("good") ? "Good" : "Bad"
    ),
  };
}

async function warmUp(policy: ClassificationEpsilonGreedy): Promise<string[]> {
  const visited: string[] = [];
  for (let i = 0; i < policy.arms.length; i++) {
    visited.push(await policy.select());
  }
  return visited;
}

describe("ClassificationEpsilonGreedy", () => {
  it("learns from review text", () => {
    const policy = new ClassificationEpsilonGreedy(["A"], keywordClassifier());
    expect(policy.feedbackKind).toBe("review_text");
    expect(policy.name).toBe("ClassificationEpsilonGreedy");
  });

  it("visits every arm once before using its estimates", async () => {
    const policy = new ClassificationEpsilonGreedy(["A", "B", "C"], keywordClassifier(), {
      epsilon: 0,
    });
    expect(await warmUp(policy)).toEqual(["A", "B", "C"]);
  });

  it("classifies each update and counts the label", async () => {
    const classifier = keywordClassifier();
    const policy = new ClassificationEpsilonGreedy(["A", "B"], classifier);

    await policy.update("A", "a good meal");
    await policy.update("A", "a sad meal");
    await policy.update("B", "good again");

    expect(classifier.classify).toHaveBeenCalledTimes(3);
    expect(policy.counts()).toEqual(
      new Map([
        ["A", { good: 1, bad: 1 }],
        ["B", { good: 1, bad: 0 }],
      ])
    );
    expect(policy.goodProportion("A")).toBe(0.5);
  });

  it("exploits the arm with the highest share of Good reviews", async () => {
    const policy = new ClassificationEpsilonGreedy(["A", "B"], keywordClassifier(), {
      epsilon: 0,
    });
    await warmUp(policy);
    await policy.update("A", "good");
    await policy.update("A", "meh");
    await policy.update("B", "good");

    expect(await policy.select()).toBe("B");
  });

  it("treats an arm without reviews as all Good", async () => {
    const policy = new ClassificationEpsilonGreedy(["A", "B"], keywordClassifier(), {
      epsilon: 0,
    });
    await warmUp(policy);
    await policy.update("A", "meh");

    expect(policy.goodProportion("B")).toBe(1);
    expect(await policy.select()).toBe("B");
  });

  it("breaks ties uniformly with the injected randomness", async () => {
    const policy = new ClassificationEpsilonGreedy(["A", "B", "C"], keywordClassifier(), {
      epsilon: 0,
      random: () => 0.99,
    });
    await warmUp(policy);

    expect(await policy.select()).toBe("C");
  });

  it("propagates classification errors without counting", async () => {
    const classifier: ReviewClassifier = {
      classify: async () => {
        throw new ClassificationError("Maybe");
      },
    };
    const policy = new ClassificationEpsilonGreedy(["A"], classifier);

    await expect(policy.update("A", "text")).rejects.toThrow(ClassificationError);
    expect(policy.counts().get("A")).toEqual({ good: 0, bad: 0 });
  });

  it("returns count snapshots the caller cannot mutate", async () => {
    const policy = new ClassificationEpsilonGreedy(["A"], keywordClassifier());
    const snapshot = policy.counts();
    snapshot.set("A", { good: 9, bad: 9 });

    expect(policy.counts().get("A")).toEqual({ good: 0, bad: 0 });
  });

  it("rejects unknown arms and invalid epsilon", async () => {
    const policy = new ClassificationEpsilonGreedy(["A"], keywordClassifier());
    await expect(policy.update("Z", "good")).rejects.toThrow(UnknownArmError);
    expect(() => new ClassificationEpsilonGreedy(["A"], keywordClassifier(), { epsilon: 2 })).toThrow(
      PolicyConfigError
    );
  });
});

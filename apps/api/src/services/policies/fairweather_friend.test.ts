import { describe, it, expect, vi } from "vitest";
import type { ReviewLabel } from "../../schemas/index.js";
import { UnknownArmError } from "../errors.js";
import type { ReviewClassifier } from "../oracle/types.js";
import { FairweatherFriend } from "./fairweather_friend.js";

function labelsByText(labels: Record<string, ReviewLabel>) {
  return {
    classify: vi.fn<ReviewClassifier["classify"]>(async (text) => labels[text] ?? "Bad"),
  };
}

describe("FairweatherFriend", () => {
  it("picks any arm on the first turn without classifying", async () => {
    const classifier = labelsByText({});
    const policy = new FairweatherFriend(["A", "B", "C"], classifier, { random: () => 0.5 });

    expect(await policy.select()).toBe("B");
    expect(classifier.classify).not.toHaveBeenCalled();
    expect(policy.feedbackKind).toBe("review_text");
  });

  it("returns after Good reviews and leaves after Bad ones", async () => {
    const classifier = labelsByText({ r1: "Good", r2: "Bad", r3: "Good" });
    const policy = new FairweatherFriend(["A", "B", "C"], classifier, { random: () => 0 });

    const turn1 = await policy.select();
    await policy.update(turn1, "r1");
    const turn2 = await policy.select();
    await policy.update(turn2, "r2");
    const turn3 = await policy.select();
    await policy.update(turn3, "r3");
    const turn4 = await policy.select();

    expect(turn1).toBe("A");
    expect(turn2).toBe("A");
    expect(turn3).toBe("B");
    expect(turn4).toBe("B");
    expect(classifier.classify.mock.calls.map(([text]) => text)).toEqual(["r1", "r2", "r3"]);
  });

  it("never returns to an arm right after a Bad review", async () => {
    const policy = new FairweatherFriend(["A", "B", "C"], labelsByText({}));
    for (let i = 0; i < 100; i++) {
      await policy.update("A", "awful");
      expect(await policy.select()).not.toBe("A");
    }
  });

  it("stays on the only arm even after a Bad review", async () => {
    const policy = new FairweatherFriend(["solo"], labelsByText({}));
    await policy.update("solo", "awful");
    expect(await policy.select()).toBe("solo");
  });

  it("classifies lazily on select rather than on update", async () => {
    const classifier = labelsByText({ fine: "Good" });
    const policy = new FairweatherFriend(["A", "B"], classifier);

    await policy.update("B", "fine");
    expect(classifier.classify).not.toHaveBeenCalled();
    expect(policy.lastTurn).toEqual({ arm: "B", reviewText: "fine" });

    expect(await policy.select()).toBe("B");
    expect(classifier.classify).toHaveBeenCalledWith("fine");
  });

  it("treats an empty previous review as a first turn", async () => {
    const classifier = labelsByText({});
    const policy = new FairweatherFriend(["A", "B"], classifier, { random: () => 0 });
    await policy.update("A", "");

    expect(await policy.select()).toBe("B");
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("rejects updates for unknown arms", async () => {
    const policy = new FairweatherFriend(["A"], labelsByText({}));
    await expect(policy.update("Z", "ok")).rejects.toThrow(UnknownArmError);
    expect(policy.lastTurn).toBeNull();
  });
});

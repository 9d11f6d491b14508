import { describe, it, expect } from "vitest";
import { ImportanceDetector, loadBundledImportanceData } from "../importance.js";

const T0 = Date.UTC(2026, 0, 1, 9, 0, 0);

describe("ImportanceDetector", () => {
  const detector = new ImportanceDetector(loadBundledImportanceData(), [{ number: "+15550100", name: "Ravi" }]);

  it("scores a known contact asking something urgent", () => {
    expect(detector.analyze({ id: "1", from: "Ravi", text: "Urgent: call me today?", at: T0 })).toEqual({
      important: true,
      score: 0.9,
      reasons: ["known_contact", "keyword:urgent", "keyword:call me", "time_sensitive", "question"],
    });
  });

  it("matches contacts by number", () => {
    expect(detector.analyze({ id: "2", from: "+1 555 0100", text: "See you", at: T0 })).toEqual({
      important: false,
      score: 0.3,
      reasons: ["known_contact"],
    });
  });

  it("keeps low scores unimportant", () => {
    // "later" contains the keyword "late"
    expect(detector.analyze({ id: "3", from: "+15550999", text: "lunch later?", at: T0 })).toEqual({
      important: false,
      score: 0.25,
      reasons: ["keyword:late", "question"],
    });
  });

  it("discards spam whatever else it contains", () => {
    expect(detector.analyze({ id: "4", from: "Ravi", text: "URGENT! You won a free prize today?", at: T0 })).toEqual({
      important: false,
      score: 0,
      reasons: ["spam"],
    });
  });
});

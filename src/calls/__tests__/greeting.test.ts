import { describe, it, expect } from "vitest";
import {
  buildClosing,
  buildFollowUp,
  buildGreeting,
  findContact,
  timeOfDay,
} from "../greeting.js";

describe("timeOfDay", () => {
  it("buckets local hours", () => {
    expect(timeOfDay(new Date(2026, 0, 1, 5, 0))).toBe("morning");
    expect(timeOfDay(new Date(2026, 0, 1, 11, 59))).toBe("morning");
    expect(timeOfDay(new Date(2026, 0, 1, 12, 0))).toBe("afternoon");
    expect(timeOfDay(new Date(2026, 0, 1, 17, 0))).toBe("evening");
    expect(timeOfDay(new Date(2026, 0, 1, 21, 0))).toBe("night");
    expect(timeOfDay(new Date(2026, 0, 1, 4, 59))).toBe("night");
  });
});

describe("buildGreeting", () => {
  it("greets a known contact by name", () => {
    const greeting = buildGreeting({
      ownerName: "Asha Rao",
      contactName: "Ravi",
      at: new Date(2026, 0, 1, 9, 0),
      random: () => 0,
    });
    expect(greeting).toBe("Good morning Ravi! Asha Rao is currently unavailable. How may I help you?");
  });

  it("uses the evening templates", () => {
    const greeting = buildGreeting({
      ownerName: "Asha",
      contactName: "Ravi",
      at: new Date(2026, 0, 1, 18, 30),
      random: () => 0.5,
    });
    expect(greeting).toBe("Hello Ravi, good evening! Asha can't answer right now.");
  });

  it("uses a professional greeting for unknown callers", () => {
    expect(buildGreeting({ ownerName: "Asha", at: new Date(2026, 0, 1, 9, 0), random: () => 0 })).toBe(
      "Hello! You've reached Asha. They're unavailable right now. Please leave your name and message.",
    );
    // random() close to 1 still picks the last template
    expect(buildGreeting({ ownerName: "Asha", at: new Date(2026, 0, 1, 9, 0), random: () => 0.9999 })).toBe(
      "Hi there! Asha can't take your call. Would you like to leave a message?",
    );
  });
});

describe("findContact", () => {
  const contacts = [
    { number: "+91 98765-43210", name: "Ravi" },
    { number: "555 0100", name: "Meera" },
  ];

  it("matches numbers ignoring formatting", () => {
    expect(findContact(contacts, "+919876543210")?.name).toBe("Ravi");
    expect(findContact(contacts, "(555) 0100")?.name).toBe("Meera");
  });

  it("returns undefined for unknown numbers", () => {
    expect(findContact(contacts, "+15550199")).toBeUndefined();
  });
});

describe("closing lines", () => {
  it("follows up and closes", () => {
    expect(buildFollowUp(() => 0)).toBe("I'm still here. How can I help you?");
    expect(buildClosing("Asha", false)).toBe("Thank you for calling. I'll pass your message to Asha. Goodbye!");
    expect(buildClosing("Asha", true)).toBe("I'll make sure Asha gets this message urgently. Goodbye!");
  });
});

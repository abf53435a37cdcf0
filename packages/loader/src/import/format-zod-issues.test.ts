import { describe, it, expect } from "vitest";
import { formatZodIssues } from "./format-zod-issues";

describe("formatZodIssues", () => {
  it("joins issues as path: message", () => {
    expect(
      formatZodIssues([
        { path: ["log", 0, "move"], message: "Required" },
        { path: ["players"], message: "Expected object, received string" },
      ])
    ).toBe("Validation failed: log.0.move: Required; players: Expected object, received string");
  });

  it("labels root-level issues", () => {
    expect(formatZodIssues([{ path: [], message: "Expected array, received object" }])).toBe(
      "Validation failed: (root): Expected array, received object"
    );
  });
});

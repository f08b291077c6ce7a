import { describe, it, expect } from "vitest";
import { InvalidEntryError } from "../../errors";
import { validateEntryMetadata } from "../attributes";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidEntryError) return error.issues;
    throw error;
  }
  return [];
}

describe("validateEntryMetadata", () => {
  it("trims values and drops blank attributes", () => {
    const result = validateEntryMetadata({
      label: "  Ada Lovelace ",
      attributes: { employee_id: "E-7", email: "", phone: undefined, department: " Research " },
    });

    expect(result).toEqual({
      label: "Ada Lovelace",
      attributes: { employee_id: "E-7", department: "Research" },
    });
  });

  it("keeps attributes beyond the known ones", () => {
    const result = validateEntryMetadata({ label: "Ada", attributes: { badge: "B-1" } });

    expect(result.attributes).toEqual({ badge: "B-1" });
  });

  it("accepts a formatted phone number with enough digits", () => {
    const result = validateEntryMetadata({ label: "Ada", attributes: { phone: "+1 (555) 123-4567" } });

    expect(result.attributes.phone).toBe("+1 (555) 123-4567");
  });

  it("rejects a short label", () => {
    expect(issuesOf(() => validateEntryMetadata({ label: "A" }))).toEqual([
      "label must be at least 2 characters long",
    ]);
  });

  it("reports every invalid attribute", () => {
    const issues = issuesOf(() =>
      validateEntryMetadata({
        label: "Ada",
        attributes: { email: "not-an-email", phone: "555-1234", employee_id: "x".repeat(51) },
      })
    );

    expect(issues).toEqual([
      "employee_id must be less than 50 characters long",
      "invalid email format",
      "phone number must contain at least 10 digits",
    ]);
  });
});

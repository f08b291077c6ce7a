import { z } from "zod";
import { InvalidEntryError } from "../errors";

const optionalText = (max: number, label: string) =>
  z
    .string()
    .trim()
    .max(max, `${label} must be less than ${max} characters long`)
    .optional();

const entryMetadataSchema = z.object({
  label: z
    .string({ required_error: "label is required" })
    .trim()
    .min(2, "label must be at least 2 characters long")
    .max(100, "label must be less than 100 characters long"),
  attributes: z
    .object({
      employee_id: optionalText(50, "employee_id"),
      department: optionalText(100, "department"),
      position: optionalText(100, "position"),
      email: z
        .string()
        .trim()
        .regex(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, "invalid email format")
        .optional(),
      phone: z
        .string()
        .trim()
        .refine((value) => value.replace(/\D/g, "").length >= 10, "phone number must contain at least 10 digits")
        .optional(),
    })
    .catchall(z.string())
    .default({}),
});

export interface EntryMetadataInput {
  label: string;
  attributes?: Record<string, string | undefined>;
}

export interface EntryMetadata {
  label: string;
  attributes: Record<string, string>;
}

/**
 * Validate label and attributes for a new entry. Blank optional attributes are dropped.
 */
export function validateEntryMetadata(input: EntryMetadataInput): EntryMetadata {
  const withoutBlanks = {
    ...input,
    attributes: Object.fromEntries(
      Object.entries(input.attributes ?? {}).filter(
        (pair): pair is [string, string] => pair[1] !== undefined && pair[1].trim() !== ""
      )
    ),
  };

  const result = entryMetadataSchema.safeParse(withoutBlanks);
  if (!result.success) {
    throw new InvalidEntryError(result.error.issues.map((issue) => issue.message));
  }

  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(result.data.attributes)) {
    if (value !== undefined) attributes[key] = value;
  }
  return { label: result.data.label, attributes };
}

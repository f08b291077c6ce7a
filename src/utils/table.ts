import type { MatchResult } from "../recognition/types";

export interface ColumnWidths {
  label: number;
  attribute: number;
}

const DEFAULT_COLUMN_WIDTHS: ColumnWidths = {
  label: 20,
  attribute: 16,
};

function fit(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value.padEnd(width);
}

export function formatBox(result: MatchResult): string {
  const { top, right, bottom, left } = result.observation.boundingBox;
  return `${left},${top}-${right},${bottom}`;
}

export function formatFaceRow(result: MatchResult, columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): string {
  const label = result.isKnown && result.label ? result.label : "Unknown";
  const confidence = result.isKnown ? `${result.confidence.toFixed(1)}%` : "-";
  const distance = result.rawDistance === null ? "-" : result.rawDistance.toFixed(4);
  const employeeId = result.attributes?.employee_id ?? "";

  return ` ${String(result.observation.index + 1).padStart(2)}  ${fit(label, columns.label)} ${confidence.padEnd(10)} ${distance.padEnd(10)} ${fit(employeeId, columns.attribute)} ${formatBox(result)}`;
}

/**
 * Print one line per face, in detector order.
 */
export function printFaceTable(results: readonly MatchResult[], columns: ColumnWidths = DEFAULT_COLUMN_WIDTHS): void {
  const labelHeader = "Name".padEnd(columns.label);
  const attrHeader = "Employee ID".padEnd(columns.attribute);
  console.log(` #   ${labelHeader} Confidence Distance   ${attrHeader} Box`);
  console.log("─".repeat(40 + columns.label + columns.attribute));

  for (const result of results) {
    console.log(formatFaceRow(result, columns));
  }
}

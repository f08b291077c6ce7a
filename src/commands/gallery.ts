import { loadConfig } from "../config";
import { initDatabase, getAllEntries, getEntry, closeDatabase } from "../db";
import { galleryKind } from "../services";
import { describeKind } from "../descriptors/types";

interface GalleryListOptions {
  json?: boolean;
}

function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 1) + "…" : value;
}

export async function galleryListCommand(options: GalleryListOptions = {}): Promise<void> {
  const config = loadConfig();
  initDatabase(config.database.path);
  const entries = getAllEntries();
  closeDatabase();

  if (options.json) {
    const data = entries.map((e) => ({
      id: e.id,
      label: e.label,
      kind: e.descriptor.kind,
      dimension: e.descriptor.values.length,
      attributes: e.attributes ?? {},
    }));
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (entries.length === 0) {
    console.log("Gallery is empty. Run 'rollcall enroll' first.");
    return;
  }

  const headers = ["ID", "Name", "Employee ID", "Department", "Position"];
  const widths = [6, 24, 14, 16, 16];
  const divider = widths.map((w) => "─".repeat(w)).join("─");

  console.log(`\nGallery (${describeKind(galleryKind(config))}):`);
  console.log(divider);
  console.log(headers.map((h, i) => h.padEnd(widths[i])).join(" "));
  console.log(divider);

  for (const entry of entries) {
    const attrs = entry.attributes ?? {};
    const row = [
      String(entry.id),
      truncate(entry.label, widths[1]),
      truncate(attrs.employee_id ?? "-", widths[2]),
      truncate(attrs.department ?? "-", widths[3]),
      truncate(attrs.position ?? "-", widths[4]),
    ];
    console.log(row.map((v, i) => v.padEnd(widths[i])).join(" "));
  }

  console.log(divider);
  console.log(`\n${entries.length} entr${entries.length === 1 ? "y" : "ies"} total.`);
}

interface GalleryShowOptions {
  json?: boolean;
}

export async function galleryShowCommand(idArg: string, options: GalleryShowOptions = {}): Promise<void> {
  const config = loadConfig();
  initDatabase(config.database.path);
  const entry = getEntry(/^\d+$/.test(idArg) ? Number(idArg) : idArg);
  closeDatabase();

  if (!entry) {
    console.log(`Entry ${idArg} not found.`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(entry, null, 2));
    return;
  }

  console.log(`\n${entry.label} (entry ${entry.id})`);
  console.log(`  Descriptor: ${entry.descriptor.kind}, ${entry.descriptor.values.length} values`);
  for (const [key, value] of Object.entries(entry.attributes ?? {})) {
    console.log(`  ${key}: ${value}`);
  }
}

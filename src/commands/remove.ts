import { loadConfig } from "../config";
import { closeDatabase } from "../db";
import { errorMessage } from "../errors";
import { createServices } from "../services";
import { confirm } from "../utils/confirm";

interface RemoveOptions {
  yes?: boolean;
}

function parseEntryId(value: string): number | string {
  return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * remove - Delete an enrolled entry and publish the rebuilt gallery
 */
export async function removeCommand(idArg: string, options: RemoveOptions = {}): Promise<void> {
  const config = loadConfig();

  try {
    const services = await createServices(config);
    const id = parseEntryId(idArg);
    const entry = await services.entries.getEntry(id);
    if (!entry) {
      console.log(`Entry ${idArg} not found.`);
      process.exitCode = 1;
      return;
    }

    if (!options.yes) {
      const confirmed = await confirm(`Remove ${entry.label} (entry ${entry.id}) from the gallery?`);
      if (!confirmed) {
        console.log("Cancelled.");
        return;
      }
    }

    const gallery = await services.manager.remove(id);
    console.log(`Removed ${entry.label}. Gallery v${gallery.version} has ${gallery.size} entries.`);
  } catch (error) {
    console.error(`Failed to remove entry: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

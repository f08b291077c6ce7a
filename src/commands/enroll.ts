import ora from "ora";
import { loadConfig } from "../config";
import { closeDatabase } from "../db";
import { errorMessage, isRollcallError } from "../errors";
import { readImageFile } from "../faces/image";
import { createServices } from "../services";

export interface EnrollOptions {
  label: string;
  employeeId?: string;
  department?: string;
  position?: string;
  email?: string;
  phone?: string;
  json?: boolean;
}

export async function enrollCommand(imagePath: string, options: EnrollOptions): Promise<void> {
  const config = loadConfig();
  const spinner = ora();

  try {
    spinner.start("Loading gallery...");
    const services = await createServices(config);
    spinner.succeed(`Gallery v${services.registry.version} loaded (${services.registry.snapshot().size} entries)`);

    spinner.start(`Enrolling ${options.label}...`);
    const image = await readImageFile(imagePath);
    const { entry, gallery } = await services.manager.enroll(image, {
      label: options.label,
      attributes: {
        employee_id: options.employeeId,
        department: options.department,
        position: options.position,
        email: options.email,
        phone: options.phone,
      },
    });
    spinner.succeed(`Enrolled ${entry.label} as entry ${entry.id} (gallery v${gallery.version}, ${gallery.size} entries)`);

    if (options.json) {
      console.log(
        JSON.stringify({ id: entry.id, label: entry.label, attributes: entry.attributes, galleryVersion: gallery.version }, null, 2)
      );
    }
  } catch (error) {
    spinner.fail(`Enrollment failed: ${errorMessage(error)}`);
    if (isRollcallError(error, "MULTIPLE_FACES_DETECTED")) {
      console.error("\nCrop the photo so only the person being enrolled is visible.");
    }
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

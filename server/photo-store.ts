import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { NotFoundError, toError } from "../shared/errors.js";
import { log } from "./logger.js";

const EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/png": ".png",
  "image/webp": ".webp",
};

export const ACCEPTED_PHOTO_TYPES = Object.keys(EXTENSIONS);

/** Uploaded photo files on local disk, addressed by a generated name. */
export class PhotoStore {
  constructor(private readonly directory: string) {}

  async save(content: Buffer, contentType: string): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const fileName = `${randomUUID()}${EXTENSIONS[contentType] ?? ".bin"}`;
    await fs.writeFile(path.join(this.directory, fileName), content);
    return fileName;
  }

  async read(fileName: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(fileName));
    } catch (error) {
      throw new NotFoundError(`Photo file ${fileName} not found: ${toError(error).message}`);
    }
  }

  async remove(fileName: string): Promise<void> {
    try {
      await fs.rm(this.resolve(fileName), { force: true });
    } catch (error) {
      log(`Failed to remove photo file ${fileName}: ${toError(error).message}`, "photos");
    }
  }

  private resolve(fileName: string): string {
    return path.join(this.directory, path.basename(fileName));
  }
}

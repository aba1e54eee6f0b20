import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Logger } from "./logger.js";

export const DEFAULT_INSTRUCTIONS = "You are a helpful assistant.";

const isMissingFileError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "ENOTDIR");

/** Reads the system instructions, falling back to a generic prompt when the file is absent. */
export const loadInstructions = async (
  workingDir: string,
  fileName: string,
  logger: Logger,
): Promise<string> => {
  try {
    const content = await readFile(resolve(workingDir, fileName), "utf8");
    if (content.trim().length === 0) {
      logger.warn(`'${fileName}' is empty. 'instructions' defaults to '${DEFAULT_INSTRUCTIONS}'`);
      return DEFAULT_INSTRUCTIONS;
    }
    logger.info(`'${fileName}' loaded successfully`);
    return content;
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
    logger.error(`'${fileName}' not found. 'instructions' defaults to '${DEFAULT_INSTRUCTIONS}'`);
    return DEFAULT_INSTRUCTIONS;
  }
};

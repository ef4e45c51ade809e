import type { PipelineExtension } from "../types/extensions.js";
import { errorMessage } from "../errors/index.js";
import type { Logger } from "../log/logger.js";

/**
 * Scoped execution: runs `body` with the extension and always fires its
 * cleanup on the way out. A cleanup failure is logged and never replaces
 * the error that ended `body`.
 */
export async function withExtension<E extends PipelineExtension, T>(
  extension: E,
  logger: Logger,
  body: (ext: E) => Promise<T>
): Promise<T> {
  try {
    return await body(extension);
  } finally {
    try {
      await extension.cleanup();
    } catch (e) {
      logger.error(`Error during extension cleanup: ${errorMessage(e)}`, { error: e });
    }
  }
}

import { ConfigManager } from "../core/config-manager.js";
import { SnapshotStore } from "../core/snapshot-store.js";
import { AppliedNotRecordedError, NoPreviousConfigError, isMcpHelperError } from "../core/errors.js";
import { createDefaultRegistry, type ClientRegistry } from "../clients/registry.js";
import { detectPlatformContext, resolveHistoryFile, type PlatformContext } from "../clients/platform.js";
import { log } from "../utils/logger.js";
import { EXIT_ERROR } from "../utils/constants.js";

/**
 * Per-invocation wiring shared by all commands.
 */
export interface CommandContext {
  platform: PlatformContext;
  registry: ClientRegistry;
  manager: ConfigManager;
}

export function createCommandContext(
  platform: PlatformContext = detectPlatformContext()
): CommandContext {
  const historyPath = resolveHistoryFile(platform);
  log.debug(`History file: ${historyPath}`);
  return {
    platform,
    registry: createDefaultRegistry(platform),
    manager: new ConfigManager({ store: new SnapshotStore(historyPath) }),
  };
}

/**
 * Render an error and return the exit code.
 */
export function reportError(err: unknown): number {
  if (err instanceof AppliedNotRecordedError) {
    log.error(err.message);
    log.warn(
      "The client config was changed but history was not updated; live state and history are out of sync."
    );
  } else if (err instanceof NoPreviousConfigError) {
    log.error(err.message);
    log.info("This is the first recorded configuration; there is nothing earlier to restore.");
  } else if (isMcpHelperError(err)) {
    log.error(err.message);
  } else {
    log.error(err instanceof Error ? err.message : String(err));
  }

  if (err instanceof Error && err.stack) log.debug(err.stack);
  return EXIT_ERROR;
}

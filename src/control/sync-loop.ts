import type { Logger } from "../logger.js";
import { errorMessage } from "../errors.js";

export interface Tickable {
  tick(now?: number): Promise<unknown>;
}

/**
 * Drives `target.tick()` every `intervalMs`. A tick that is still running when
 * the timer fires again makes that firing a no-op.
 */
export function startSyncLoop(
  target: Tickable,
  logger: Logger,
  intervalMs = 1_000
): ReturnType<typeof setInterval> {
  let running = false;

  return setInterval(() => {
    if (running) {
      logger.debug("previous sync tick still running, skipping");
      return;
    }
    running = true;
    target.tick().then(
      () => {
        running = false;
      },
      (err: unknown) => {
        running = false;
        logger.error({ err: errorMessage(err) }, "sync tick failed");
      }
    );
  }, intervalMs);
}

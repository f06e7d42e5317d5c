import type { Logger } from "@armguard/shared";

/**
 * One-shot signal handler: the first signal runs `close` and exits; repeats
 * are logged and ignored while that is in progress.
 */
export function createShutdownHandler(args: {
  logger: Logger;
  close: () => Promise<void>;
  exit?: (code: number) => void;
}): (signal: string) => Promise<void> {
  const exit = args.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) {
      args.logger.warn("shutdown already in progress", { signal });
      return;
    }
    shuttingDown = true;
    args.logger.warn("shutdown signal", { signal });
    try {
      await args.close();
    } catch (error) {
      args.logger.error("shutdown failed", { error: error instanceof Error ? error.message : String(error) });
      exit(1);
      return;
    }
    exit(0);
  };
}

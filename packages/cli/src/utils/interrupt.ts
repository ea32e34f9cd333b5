export interface InterruptHandle {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Turns the first Ctrl-C into an abort so work stops at the next safe point.
 * A second Ctrl-C falls through to the default handler.
 */
export function onInterrupt(): InterruptHandle {
  const controller = new AbortController();
  const handler = () => controller.abort();
  process.once('SIGINT', handler);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', handler);
    },
  };
}

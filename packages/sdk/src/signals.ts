/**
 * SIGINT wiring
 */

export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Route every Ctrl+C to `onInterrupt`. Returns the uninstaller.
 *
 * Installing a listener replaces Node's default exit-on-SIGINT, so the
 * handler decides when the process ends.
 */
export function installInterruptHandler(
  onInterrupt: () => void,
  target: SignalSource = process,
): () => void {
  const listener = () => onInterrupt();
  target.on('SIGINT', listener);
  return () => {
    target.off('SIGINT', listener);
  };
}

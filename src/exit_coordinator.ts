// src/exit_coordinator.ts

/**
 * Holds the exit value returned to a forwarding instance.
 *
 * The receiver resets it to 0 for each command line, and a commandLine
 * listener sets it while the request is being handled. The receiver reads
 * it once the listeners have been called. Under queued delivery the reply
 * is sent before the listeners run, so it carries 0.
 */
export class ExitCoordinator {
  private value = 0;

  setExitValue(value: number): void {
    this.value = value;
  }

  currentExitValue(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }
}

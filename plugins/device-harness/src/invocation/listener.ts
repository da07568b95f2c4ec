import { createLogger } from '../shared/logger.js';

const log = createLogger('listener');

export interface TestInvocationListener {
  testRunStarted(runName: string): void;
  testRunFailed(message: string): void;
  testRunEnded(elapsedMs: number): void;
}

export interface RunFailure {
  runName: string;
  message: string;
}

// Logs and records every run event, then forwards it to an optional delegate.
export class LoggingInvocationListener implements TestInvocationListener {
  private currentRun: string | null = null;
  private readonly failures: RunFailure[] = [];

  constructor(private readonly delegate?: TestInvocationListener) {}

  testRunStarted(runName: string): void {
    this.currentRun = runName;
    log.info({ run: runName }, 'Test run started');
    this.delegate?.testRunStarted(runName);
  }

  testRunFailed(message: string): void {
    const runName = this.currentRun ?? 'unknown';
    this.failures.push({ runName, message });
    log.error({ run: runName }, `Test run failed: ${message}`);
    this.delegate?.testRunFailed(message);
  }

  testRunEnded(elapsedMs: number): void {
    log.info({ run: this.currentRun, elapsedMs }, 'Test run ended');
    this.currentRun = null;
    this.delegate?.testRunEnded(elapsedMs);
  }

  getFailures(): RunFailure[] {
    return [...this.failures];
  }
}

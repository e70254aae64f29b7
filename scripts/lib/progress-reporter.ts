/**
 * Progress Reporter for the MATT ETL
 * Provides formatted console output for tracking a run
 */

export interface ProgressStats {
  processed: number;
  total: number;
  duration?: number; // seconds
}

export class ProgressReporter {
  private startTime: Date | null = null;

  constructor(private readonly debugMode: boolean = false) {}

  /**
   * Log the start of a run
   */
  logRunStart(runName: string, totalSteps: number): void {
    this.startTime = new Date();
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  MATT Enrichment Run Started                                   ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Run Name:    ${runName}`);
    console.log(`  Total Steps: ${totalSteps}`);
    console.log(`  Started:     ${this.startTime.toISOString()}`);
    console.log('');
  }

  /**
   * Log the start of a step
   */
  logStep(step: string, currentStep: number, totalSteps: number, detail?: string): void {
    const percent = ((currentStep / totalSteps) * 100).toFixed(1);
    console.log(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
    if (detail) {
      console.log(`    ${detail}`);
    }
  }

  logRecords(stats: ProgressStats): void {
    const { processed, total, duration } = stats;

    let progressLine = `    Processed: ${this.formatNumber(processed)}`;

    if (total > 0) {
      const percent = ((processed / total) * 100).toFixed(1);
      progressLine += ` / ${this.formatNumber(total)} (${percent}%)`;
    }

    if (duration) {
      progressLine += ` | ${this.formatDuration(duration)}`;
    }

    console.log(progressLine);
  }

  /**
   * Log step completion
   */
  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    console.log(message);
    console.log('');
  }

  logStepFailure(stepName: string, error: Error): void {
    console.log(`    ❌ ${stepName} FAILED`);
    console.log(`       Error: ${error.message}`);
    console.log('');
  }

  /**
   * Log run completion
   */
  logRunComplete(totalSteps: number, totalDuration: number): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  MATT Enrichment Run Completed                                 ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Steps Completed: ${totalSteps}`);
    console.log(`  Total Duration:  ${this.formatDuration(totalDuration)}`);
    if (this.startTime) {
      console.log(`  Started:         ${this.startTime.toISOString()}`);
      console.log(`  Completed:       ${new Date().toISOString()}`);
    }
    console.log('');
  }

  logRunFailure(error: Error): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  MATT Enrichment Run FAILED                                    ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Error: ${error.message}`);
    console.log('');
  }

  logWarning(message: string): void {
    console.log(`  ⚠️  ${message}`);
  }

  logInfo(message: string): void {
    console.log(`  ℹ️  ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string): void {
    if (this.debugMode) {
      console.log(`  🐛 DEBUG: ${message}`);
    }
  }

  /**
   * Format a number with thousand separators
   */
  formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    }
    const minutes = Math.floor(seconds / 60);
    const remaining = Math.round(seconds % 60);
    return `${minutes}m ${remaining}s`;
  }
}

/**
 * Progress Reporter for report jobs
 * Provides formatted console output for tracking report generation
 */

export class ProgressReporter {
  private startTime: Date | null = null;

  /**
   * Log the start of a report run
   */
  logRunStart(reportName: string, details: Record<string, string>): void {
    this.startTime = new Date();
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Report Run Started                                            ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Report:      ${reportName}`);
    for (const [label, value] of Object.entries(details)) {
      console.log(`  ${`${label}:`.padEnd(13)}${value}`);
    }
    console.log(`  Started:     ${this.startTime.toISOString()}`);
    console.log('');
  }

  logStep(step: string, currentStep: number, totalSteps: number): void {
    const percent = ((currentStep / totalSteps) * 100).toFixed(1);
    console.log(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
  }

  /**
   * Log the shape of a dataset that will become a sheet
   */
  logDataset(sheetName: string, rows: number, columns: number): void {
    console.log(`    📄 Sheet '${sheetName}' - Rows: ${this.formatNumber(rows)}  |  Columns: ${columns}`);
  }

  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    console.log(message);
    console.log('');
  }

  /**
   * Print a small two-column table (e.g. the Status summary)
   */
  logTable(title: string, rows: Array<[string, number]>): void {
    console.log(`\n  📊 ${title}`);
    if (rows.length === 0) {
      console.log('     (no data)');
      return;
    }
    const width = rows.reduce((widest, [label]) => Math.max(widest, label.length), 0);
    for (const [label, value] of rows) {
      console.log(`     ${label.padEnd(width)}  ${this.formatNumber(value).padStart(8)}`);
    }
    console.log('');
  }

  logRunComplete(artifacts: string[]): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Report Run Completed                                          ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    for (const artifact of artifacts) {
      console.log(`  Saved:       ${artifact}`);
    }
    if (this.startTime) {
      const duration = (Date.now() - this.startTime.getTime()) / 1000;
      console.log(`  Duration:    ${this.formatDuration(duration)}`);
      console.log(`  Completed:   ${new Date().toISOString()}`);
    }
    console.log('');
  }

  logRunFailure(error: Error): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Report Run FAILED                                             ║`);
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
   * Format a number with thousand separators
   */
  formatNumber(num: number): string {
    return num.toLocaleString('pt-BR');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}

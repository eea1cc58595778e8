/**
 * Debug Logger - step-by-step tracing of the refresh pipeline and API when DEBUG mode is enabled
 *
 * Usage:
 *   Set DEBUG=true in environment variables to enable debug logging
 *   Each traced operation logs a START and a FINISH (or ERROR) line with its duration
 */

import chalk from 'chalk';

interface StepTimer {
  category: string;
  description: string;
  startTime: number;
}

type LogData = Record<string, unknown>;

// Category color mapping for visual distinction
const categoryColors: Record<string, chalk.Chalk> = {
  // HTTP surface
  API: chalk.bgCyan.black.bold,
  AUTH: chalk.bgYellow.black.bold,

  // Refresh pipeline
  REFRESH: chalk.bgMagenta.white.bold,
  SCHEDULER: chalk.bgMagenta.white.bold,
  FAN_OUT: chalk.bgBlue.white.bold,
  RETRY: chalk.bgYellow.black.bold,
  RATE_LIMIT: chalk.bgCyan.black.bold,
  HN_FETCH: chalk.bgCyan.black.bold,
  CIRCUIT: chalk.bgRed.white.bold,

  // Shared state
  SNAPSHOT: chalk.bgGreen.black.bold,
  QUERY: chalk.bgGreen.black.bold,

  // System
  SYSTEM: chalk.bgWhite.black.bold,
  CONFIG: chalk.bgWhite.black.bold,
  ERROR: chalk.bgRed.white.bold,
};

function getCategoryLabel(category: string): string {
  const colorFn = categoryColors[category] || chalk.bgGray.white.bold;
  return colorFn(` ${category} `);
}

function formatData(data?: LogData): string {
  return data && Object.keys(data).length > 0
    ? chalk.dim(` │ ${JSON.stringify(data)}`)
    : '';
}

export class DebugLogger {
  private isDebugMode: boolean;
  private activeSteps: Map<string, StepTimer> = new Map();
  private stepCounter = 0;

  constructor(enabled = process.env.DEBUG === 'true' || process.env.DEBUG === '1') {
    this.isDebugMode = enabled;
  }

  isEnabled(): boolean {
    return this.isDebugMode;
  }

  /**
   * Toggle tracing at runtime (the config loader calls this once DEBUG has been validated)
   */
  setEnabled(enabled: boolean): void {
    this.isDebugMode = enabled;
  }

  /**
   * Log the start of an operation step
   * @param category - High-level category (e.g., 'REFRESH', 'FAN_OUT', 'HN_FETCH')
   * @param description - What we're about to do
   * @returns stepId for tracking this specific step, or '' when tracing is off
   */
  stepStart(category: string, description: string, metadata?: LogData): string {
    if (!this.isDebugMode) return '';

    const stepId = `${category}_${++this.stepCounter}`;
    this.activeSteps.set(stepId, { category, description, startTime: Date.now() });

    console.log(`${chalk.cyan('▶')} ${getCategoryLabel(category)} ${chalk.white(description)}${formatData(metadata)}`);

    return stepId;
  }

  stepFinish(stepId: string, result?: LogData): void {
    if (!this.isDebugMode || !stepId) return;

    const step = this.activeSteps.get(stepId);
    if (!step) {
      console.warn(chalk.yellow(`⚠ Unknown step: ${stepId}`));
      return;
    }

    const duration = Date.now() - step.startTime;
    const durationColor = duration > 1000 ? chalk.yellow : duration > 500 ? chalk.cyan : chalk.green;
    console.log(`${chalk.green('✓')} ${getCategoryLabel(step.category)} ${chalk.white(step.description)} ${durationColor(`(${duration}ms)`)}${formatData(result)}`);

    this.activeSteps.delete(stepId);
  }

  /**
   * Log an error that ended a step. `stepId` may be null when no step was started.
   */
  stepError(stepId: string | null, category: string, description: string, error: unknown): void {
    if (!this.isDebugMode) return;

    let step: StepTimer | undefined;
    let duration = 0;

    if (stepId) {
      step = this.activeSteps.get(stepId);
      if (step) {
        duration = Date.now() - step.startTime;
        this.activeSteps.delete(stepId);
      }
    }

    const durationStr = duration > 0 ? chalk.dim(` (${duration}ms)`) : '';
    const errorMsg = error instanceof Error ? error.message : String(error);

    console.log(`${chalk.red('✗')} ${getCategoryLabel(step?.category || category)} ${chalk.white(description)}${durationStr} ${chalk.red('│')} ${chalk.red(errorMsg)}`);

    if (error instanceof Error && error.stack) {
      console.log(chalk.dim(`  └─ ${error.stack.split('\n')[1]?.trim() || error.stack}`));
    }
  }

  info(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.blue('ℹ')} ${getCategoryLabel(category)} ${chalk.white(message)}${formatData(data)}`);
  }

  warn(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.yellow('⚠')} ${getCategoryLabel(category)} ${chalk.yellow(message)}${formatData(data)}`);
  }

  /**
   * Steps that were started but never finished, e.g. fetches cut short by shutdown
   */
  getActiveSteps(): Array<{ stepId: string; category: string; description: string; duration: number }> {
    const now = Date.now();
    return Array.from(this.activeSteps.entries()).map(([stepId, step]) => ({
      stepId,
      category: step.category,
      description: step.description,
      duration: now - step.startTime,
    }));
  }

  logActiveSteps(): void {
    if (!this.isDebugMode) return;

    const activeSteps = this.getActiveSteps();
    if (activeSteps.length === 0) {
      console.log(chalk.dim('📋 No active steps'));
      return;
    }

    console.log(chalk.magenta(`📋 Active steps (${activeSteps.length}):`));
    activeSteps.forEach(step => {
      console.log(chalk.dim(`  └─ `) + getCategoryLabel(step.category) + chalk.white(` ${step.description}`) + chalk.cyan(` (${step.duration}ms)`));
    });
  }
}

// Export singleton instance
export const debugLogger = new DebugLogger();

/**
 * Console output helpers shared by the logger and the pipeline runner
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  // Status colors
  error: chalk.red,
  warning: chalk.yellow,

  // Text styling
  dim: chalk.dim,

  // Symbols (cross-platform via figures)
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  info: chalk.cyan(figures.info),
  bullet: chalk.dim(figures.bullet),

  separator: chalk.dim(' · '),
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER MANAGER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  start(text: string): Ora {
    if (activeSpinner) {
      activeSpinner.stop();
    }
    activeSpinner = ora({
      text,
      spinner: 'dots',
      indent: 4,
    }).start();
    return activeSpinner;
  },

  succeed(text?: string): void {
    if (activeSpinner) {
      activeSpinner.succeed(text);
      activeSpinner = null;
    }
  },

  fail(text?: string): void {
    if (activeSpinner) {
      activeSpinner.fail(text);
      activeSpinner = null;
    }
  },

  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  start(total: number): void;
  update(current: number): void;
  stop(): void;
}

export function createProgressTracker(label: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;

  return {
    start(total: number) {
      // A spinner and a bar fight over the same line
      spinner.stop();

      bar = new cliProgress.SingleBar({
        format: `    {bar} {percentage}%  {value}/{total} ${label}`,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 20,
        hideCursor: true,
        clearOnComplete: false,
        stopOnComplete: false,
      });
      bar.start(total, 0);
    },

    update(current: number) {
      bar?.update(current);
    },

    stop() {
      if (bar) {
        bar.update(bar.getTotal());
        bar.stop();
        bar = null;
      }
    },
  };
}

/**
 * Tracker that draws nothing, for non-interactive runs.
 */
export const noopProgress: ProgressTracker = {
  start() {},
  update() {},
  stop() {},
};

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatCost(cost: number): string {
  return theme.dim(`$${cost.toFixed(4)}`);
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}

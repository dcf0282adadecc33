import cliProgress from 'cli-progress';

let activeBar: cliProgress.SingleBar | null = null;

export function createProgressBar(total: number, description: string, unit: string) {
  const bar = new cliProgress.SingleBar({
    format: `${description} |{bar}| {value}/{total} ${unit} | {current}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    stopOnComplete: true,
    synchronousUpdate: true,
  });

  activeBar = bar;
  bar.start(total, 0, { current: '' });

  return {
    increment(current: string) {
      if (activeBar === bar) bar.increment(1, { current });
    },
    finish() {
      if (activeBar !== bar) return;
      bar.stop();
      activeBar = null;
    },
  };
}

// Clears the bar's line while fn writes, then redraws it
export function withoutProgressBar<T>(fn: () => T): T {
  const currentBar = activeBar;
  if (currentBar) {
    process.stdout.write('\r\x1b[K');
  }
  const result = fn();
  if (currentBar && activeBar === currentBar) {
    currentBar.render();
  }
  return result;
}

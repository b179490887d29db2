import type { ProgressObserver } from '../search/harvester.js';

/** Writes `Progress: N%` on its own line each time the rounded percentage changes. */
export function progressPrinter(write: (line: string) => void): ProgressObserver {
  let lastPercent = -1;
  return (fraction) => {
    const percent = Math.round(fraction * 100);
    if (percent !== lastPercent) {
      lastPercent = percent;
      write(`Progress: ${percent}%\n`);
    }
  };
}

import ora from 'ora';

/**
 * Receives byte counts while an asset is copied to disk
 */
export interface ProgressReporter {
  advance(bytes: number): void;
  finish(succeeded: boolean): void;
}

/**
 * Creates a reporter for one download
 */
export type ProgressFactory = (label: string, totalBytes: number) => ProgressReporter;

export const noProgress: ProgressFactory = () => ({
  advance() {},
  finish() {},
});

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

/**
 * Terminal spinner on stderr showing bytes downloaded out of the declared size.
 * ora disables itself when stderr is not a TTY.
 */
export const spinnerProgress: ProgressFactory = (label, totalBytes) => {
  let downloaded = 0;
  const text = () => `Downloading ${label}... [${formatBytes(downloaded)} of ${formatBytes(totalBytes)}]`;
  const spinner = ora({ text: text(), stream: process.stderr }).start();

  return {
    advance(bytes) {
      downloaded += bytes;
      spinner.text = text();
    },
    finish(succeeded) {
      if (succeeded) {
        spinner.succeed(`Downloaded ${label} (${formatBytes(downloaded)})`);
      } else {
        spinner.fail(`Download of ${label} failed`);
      }
    },
  };
};

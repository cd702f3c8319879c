import { execFile } from 'node:child_process';

/**
 * Opens a URL in the default browser.
 * Falls back to printing the URL to stderr if the browser cannot be opened.
 */
export function openBrowser(url: string): void {
  const platform = process.platform;
  const onExit = (err: Error | null): void => {
    if (err) {
      process.stderr.write(`Could not open browser. Please visit:\n${url}\n`);
    }
  };
  try {
    if (platform === 'darwin') {
      execFile('open', [url], onExit);
    } else if (platform === 'win32') {
      execFile('cmd', ['/c', 'start', '', url], onExit);
    } else {
      execFile('xdg-open', [url], onExit);
    }
  } catch {
    process.stderr.write(`Could not open browser. Please visit:\n${url}\n`);
  }
}

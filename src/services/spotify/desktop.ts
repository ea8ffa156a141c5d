import { type SpawnOptions, spawn } from 'node:child_process';

export class LaunchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LaunchError';
  }
}

export type LaunchCommand = {
  command: string;
  args: string[];
  /** `open`/`start` return once the app is up, so their exit status is meaningful. */
  waitForExit: boolean;
};

export function desktopLaunchCommand(
  platform: NodeJS.Platform,
  override?: string,
): LaunchCommand {
  if (override) {
    const [command = '', ...args] = override.trim().split(/\s+/);
    return { command, args, waitForExit: false };
  }
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: ['-a', 'Spotify'], waitForExit: true };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', 'spotify:'], waitForExit: true };
    default:
      return { command: 'spotify', args: [], waitForExit: false };
  }
}

export interface LaunchedProcess {
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  once(event: 'spawn', listener: () => void): unknown;
  unref(): void;
}

export type Spawner = (command: string, args: string[], options: SpawnOptions) => LaunchedProcess;

export function createDesktopLauncher(
  options: { platform?: NodeJS.Platform; command?: string; spawnImpl?: Spawner } = {},
): () => Promise<void> {
  const { command, args, waitForExit } = desktopLaunchCommand(
    options.platform ?? process.platform,
    options.command,
  );
  const spawnImpl: Spawner = options.spawnImpl ?? spawn;

  return () =>
    new Promise<void>((resolve, reject) => {
      const child = spawnImpl(command, args, {
        detached: !waitForExit,
        stdio: 'ignore',
        windowsHide: true,
      });

      child.once('error', (error) => {
        reject(new LaunchError(`${command}: ${error.message}`, { cause: error }));
      });

      if (waitForExit) {
        child.once('exit', (code) => {
          if (code === 0) {
            resolve();
          } else {
            reject(new LaunchError(`${command} exited with code ${code ?? 'null'}`));
          }
        });
        return;
      }

      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
}

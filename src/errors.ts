export class LauncherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LauncherError';
  }
}

export class BinaryNotFoundError extends LauncherError {
  constructor(public readonly searched: string[]) {
    super(
      [
        'sandman2ctl not found. Searched:',
        ...searched.map((place) => `  - ${place}`),
        '',
        'Set SANDMAN2CTL_BINARY env var or pass binaryPath option.',
      ].join('\n')
    );
    this.name = 'BinaryNotFoundError';
  }
}

export class LaunchError extends LauncherError {
  constructor(message: string, public readonly binaryPath: string) {
    super(message);
    this.name = 'LaunchError';
  }
}

export class StartupError extends LauncherError {
  constructor(message: string, public readonly stderr?: string) {
    super(message);
    this.name = 'StartupError';
  }
}

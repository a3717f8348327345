export type OutputChannel = 'primary' | 'secondary';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class SinkWriteError extends Error {
  readonly channel: OutputChannel;

  constructor(channel: OutputChannel, cause: Error) {
    super(`failed to write to ${channel} output: ${cause.message}`, { cause });
    this.name = 'SinkWriteError';
    this.channel = channel;
  }
}

export class DecodeError extends Error {
  constructor(public readonly subject: string, public readonly issues: string[]) {
    super(`Malformed ${subject}: ${issues.join('; ')}`);
    this.name = 'DecodeError';
  }
}

export class InvalidModuleToLoadError extends Error {
  constructor() {
    super('ModuleToLoad must specify exactly one non-empty href or filename');
    this.name = 'InvalidModuleToLoadError';
  }
}

export class InvalidConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
  }
}

export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export class ProviderUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderUnavailableError';
  }
}

/** Raised before any transport call when a provider is missing a model, key or valid option. */
export class ProviderConfigError extends ProviderUnavailableError {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConfigError';
  }
}

export class OllamaUnavailableError extends ProviderUnavailableError {
  constructor(
    message = 'Could not reach the Ollama runtime. Make sure `ollama serve` is running and the model is pulled.',
  ) {
    super(message);
    this.name = 'OllamaUnavailableError';
  }
}

export class InvalidOptionError extends Error {
  readonly option: string;

  constructor(option: string) {
    super(`Invalid option "${option}". Expected the form key=value.`);
    this.name = 'InvalidOptionError';
    this.option = option;
  }
}

export class ConfigNotFoundError extends Error {
  constructor(directory: string, filename: string) {
    super(`No ${filename} configuration found in ${directory}. Run \`pocketplan init\` first.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigExistsError extends Error {
  constructor(filename: string) {
    super(`${filename} already exists. Use --overwrite to replace it.`);
    this.name = 'ConfigExistsError';
  }
}

export class ConfigInvalidError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigInvalidError';
  }
}

export class PlaybookNotFoundError extends Error {
  readonly playbook: string;

  constructor(playbook: string, available: string[]) {
    const names = available.length > 0 ? [...available].sort().join(', ') : 'none';
    super(`Playbook '${playbook}' not found. Available: ${names}`);
    this.name = 'PlaybookNotFoundError';
    this.playbook = playbook;
  }
}

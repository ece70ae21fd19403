export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

/**
 * Whether the process runs inside Termux on Android.
 * Termux exports `TERMUX_VERSION`, and its `PREFIX` lives under the `com.termux` app data.
 */
export function isConstrainedEnvironment(env: EnvironmentSource = process.env): boolean {
  return env.TERMUX_VERSION !== undefined || (env.PREFIX ?? '').includes('com.termux');
}

export const TERMUX_ENVIRONMENT_NOTE =
  'Environment: Detected Termux. Prefer `pkg` for package management and avoid sudo.';

export const GENERIC_ENVIRONMENT_NOTE =
  'Environment: Non-Termux detected. If targeting Termux, ensure commands are `pkg` compatible.';

export function environmentNote(constrained: boolean): string {
  return constrained ? TERMUX_ENVIRONMENT_NOTE : GENERIC_ENVIRONMENT_NOTE;
}

/**
 * Error prefix constant for all application errors
 */
export const appErrPrefix = 'AppErr';

/**
 * Error type constants
 */
export const appErrTypes = {
  Configuration: 'Configuration',
} as const;

/**
 * Error code constants
 */
export const appErrCodes = {
  NoAgents: 'NoAgents',
  InvalidID: 'InvalidID',
  DuplicateRegistration: 'DuplicateRegistration',
  RegistrationClosed: 'RegistrationClosed',
} as const;

export type AppErrCode = (typeof appErrCodes)[keyof typeof appErrCodes];

/**
 * The application is declared in a way that can never run.
 *
 * Fatal: it aborts startup, is surfaced to the caller of `start()` and is
 * never retried.
 */
export class ConfigurationError extends Error {
  public errPrefix = appErrPrefix;
  public errType = appErrTypes.Configuration;
  public errCode: AppErrCode;
  public additionalInfo: { appID?: string; name?: string };

  constructor(
    message: string,
    errCode: AppErrCode,
    additionalInfo: { appID?: string; name?: string } = {},
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.errCode = errCode;
    this.additionalInfo = additionalInfo;
  }
}

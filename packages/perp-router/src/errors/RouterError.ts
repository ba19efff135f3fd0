/**
 * Error taxonomy for the perp router
 */

export enum ErrorKind {
  AUTHORIZATION = 'AUTHORIZATION',
  VALIDATION = 'VALIDATION',
  STATE_CONFLICT = 'STATE_CONFLICT',
  TEMPORAL = 'TEMPORAL',
  MARKET_DATA = 'MARKET_DATA',
  LIQUIDITY = 'LIQUIDITY',
  ECONOMIC = 'ECONOMIC',
  REENTRANCY = 'REENTRANCY',
}

export enum RouterErrorCode {
  Unauthorized = 'Unauthorized',

  InvalidVenue = 'InvalidVenue',
  InvalidLeverage = 'InvalidLeverage',
  InvalidFeeRate = 'InvalidFeeRate',
  InvalidOracle = 'InvalidOracle',
  InvalidTolerance = 'InvalidTolerance',
  InvalidTimeout = 'InvalidTimeout',
  InvalidMarket = 'InvalidMarket',
  InvalidMargin = 'InvalidMargin',
  InvalidSize = 'InvalidSize',
  InvalidAddress = 'InvalidAddress',

  AlreadyRegistered = 'AlreadyRegistered',
  NotRegistered = 'NotRegistered',
  Paused = 'Paused',
  NotPaused = 'NotPaused',

  DeadlineExpired = 'DeadlineExpired',

  OracleNotSet = 'OracleNotSet',
  StalePrice = 'StalePrice',
  InvalidOraclePrice = 'InvalidOraclePrice',
  PriceDeviationTooHigh = 'PriceDeviationTooHigh',

  NoActiveVenues = 'NoActiveVenues',

  SlippageExceeded = 'SlippageExceeded',

  ReentrantCall = 'ReentrantCall',
}

const ERROR_KINDS: Record<RouterErrorCode, ErrorKind> = {
  [RouterErrorCode.Unauthorized]: ErrorKind.AUTHORIZATION,
  [RouterErrorCode.InvalidVenue]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidLeverage]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidFeeRate]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidOracle]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidTolerance]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidTimeout]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidMarket]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidMargin]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidSize]: ErrorKind.VALIDATION,
  [RouterErrorCode.InvalidAddress]: ErrorKind.VALIDATION,
  [RouterErrorCode.AlreadyRegistered]: ErrorKind.STATE_CONFLICT,
  [RouterErrorCode.NotRegistered]: ErrorKind.STATE_CONFLICT,
  [RouterErrorCode.Paused]: ErrorKind.STATE_CONFLICT,
  [RouterErrorCode.NotPaused]: ErrorKind.STATE_CONFLICT,
  [RouterErrorCode.DeadlineExpired]: ErrorKind.TEMPORAL,
  [RouterErrorCode.OracleNotSet]: ErrorKind.MARKET_DATA,
  [RouterErrorCode.StalePrice]: ErrorKind.MARKET_DATA,
  [RouterErrorCode.InvalidOraclePrice]: ErrorKind.MARKET_DATA,
  [RouterErrorCode.PriceDeviationTooHigh]: ErrorKind.MARKET_DATA,
  [RouterErrorCode.NoActiveVenues]: ErrorKind.LIQUIDITY,
  [RouterErrorCode.SlippageExceeded]: ErrorKind.ECONOMIC,
  [RouterErrorCode.ReentrantCall]: ErrorKind.REENTRANCY,
};

export class RouterError extends Error {
  public readonly kind: ErrorKind;

  constructor(
    public readonly code: RouterErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RouterError';
    this.kind = ERROR_KINDS[code];
  }
}

export function isRouterError(error: unknown, code?: RouterErrorCode): error is RouterError {
  if (!(error instanceof RouterError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

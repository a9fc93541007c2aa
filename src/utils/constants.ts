/**
 * Shared constants for instrument ranking and planning.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Score weight on average annual return. */
export const RETURN_WEIGHT = 0.4;

/** Score weight on 1 / |volatility|. */
export const VOLATILITY_WEIGHT = 0.3;

/** Score weight on 1 / |max drawdown|. */
export const DRAWDOWN_WEIGHT = 0.3;

/** Horizons strictly above this (years) are scored without the short-horizon penalty. */
export const LONG_HORIZON_YEARS = 10;

/** Multiplier applied to scores for horizons at or below LONG_HORIZON_YEARS. */
export const SHORT_HORIZON_PENALTY = 0.8;

/** Trading days used to annualize daily volatility. */
export const TRADING_DAYS_PER_YEAR = 252;

/** Average calendar year length used for horizon calculation. */
export const DAYS_PER_YEAR = 365.25;

/** Future periods forecast when the caller does not say. */
export const DEFAULT_FORECAST_PERIODS = 10;

/** Window (in returns) for rolling correlation. */
export const DEFAULT_ROLLING_WINDOW = 30;

/** Window (in returns) for rolling annualized volatility. */
export const DEFAULT_VOLATILITY_WINDOW = 7;

/** Shared returns needed before a correlation is defined. */
export const MIN_CORRELATION_OBSERVATIONS = 2;

/** Target dates closer than this (years) are rejected by the API. */
export const MIN_HORIZON_YEARS = 1;

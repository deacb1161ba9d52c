export { default as logger, Logging, createScopedLogger } from './logger';
export { sendSuccess, sendError, sendList } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError, type AppErrorCode } from './AppError';
export { Decimal, toDecimal, parsePositiveAmount, sumDecimals, AMOUNT_SCALE } from './money';
export { requireName, optionalText, assertLimit, assertThreshold, assertValidDate } from './validation';

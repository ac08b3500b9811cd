import { BadConversionError } from "./errors.js";

const decimalPattern = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const integerPattern = /^[-+]?\d+$/;
const unsignedPattern = /^\+?\d+$/;

const toSafeInteger = (value: string, pattern: RegExp) => {
  if (!pattern.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
};

export function toNumber(value: string, optionName: string) {
  const parsed = decimalPattern.test(value) ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new BadConversionError(value, "number", optionName);
  }
  return parsed;
}

export function toInteger(value: string, optionName: string) {
  const parsed = toSafeInteger(value, integerPattern);
  if (parsed === undefined) {
    throw new BadConversionError(value, "integer", optionName);
  }
  // -0 reads back as 0
  return parsed === 0 ? 0 : parsed;
}

export function toUnsigned(value: string, optionName: string) {
  const parsed = toSafeInteger(value, unsignedPattern);
  if (parsed === undefined) {
    throw new BadConversionError(value, "unsigned", optionName);
  }
  return parsed;
}

export function toBoolean(value: string, optionName: string) {
  if (value === "true") return true;
  if (value === "false") return false;
  throw new BadConversionError(value, "boolean", optionName);
}

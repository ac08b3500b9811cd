import type { ClargConversion, ClargOption } from "./types.js";

export const optionLabel = (option: Pick<ClargOption, "short" | "long">) =>
  [option.long, option.short].filter(Boolean).join(", ");

const quoteAll = (values: readonly string[]) => values.map((value) => `"${value}"`).join(", ");

/**
 * Base class for every error raised by clarg.
 */
export class ClargError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidOptionNameError extends ClargError {
  constructor(readonly optionName: string, reason: string) {
    super(`Invalid option name "${optionName}": ${reason}.`);
  }
}

export class DuplicateOptionError extends ClargError {
  constructor(
    readonly option: Pick<ClargOption, "short" | "long">,
    readonly existing: Pick<ClargOption, "short" | "long">,
  ) {
    super(`Option (${optionLabel(option)}) is already in use by (${optionLabel(existing)}).`);
  }
}

export class StructuralRegistrationError extends ClargError {}

export class InvalidValueError extends ClargError {
  constructor(
    readonly value: string,
    readonly allowed: readonly string[],
    readonly optionName: string,
  ) {
    super(
      `Value "${value}" for option "${optionName}" is not a valid choice.` +
        ` Valid choices are ${allowed.join(", ")}.`,
    );
  }
}

export class InvalidDefaultError extends InvalidValueError {}

export class MissingRequiredError extends ClargError {
  constructor(readonly missing: readonly string[]) {
    super(`Missing required ${missing.length === 1 ? "option" : "options"} ${missing.join(", ")}.`);
  }
}

export class OptionNotFoundError extends ClargError {
  constructor(readonly optionName: string) {
    super(`Option "${optionName}" not found.`);
  }
}

export class BadConversionError extends ClargError {
  constructor(
    readonly value: string,
    readonly target: ClargConversion,
    readonly optionName: string,
  ) {
    super(
      target === "boolean"
        ? `Value "${value}" for option "${optionName}" is not a boolean. Expected "true" or "false".`
        : `Value "${value}" for option "${optionName}" is not a valid ${target}.`,
    );
  }
}

export class UnexpectedExtraArgumentsError extends ClargError {
  constructor(readonly extra: readonly string[]) {
    super(`Unexpected extra ${extra.length === 1 ? "argument" : "arguments"} ${quoteAll(extra)}.`);
  }
}

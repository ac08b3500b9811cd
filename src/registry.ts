import { toBoolean, toInteger, toNumber, toUnsigned } from "./convert.js";
import {
  DuplicateOptionError,
  InvalidDefaultError,
  InvalidOptionNameError,
  InvalidValueError,
  OptionNotFoundError,
  StructuralRegistrationError,
  optionLabel,
} from "./errors.js";
import type { ClargConversion, ClargEntry, ClargOption } from "./types.js";

/**
 * Renders the current value of an entry the way `getOption(name)` returns it.
 */
export function displayValue(entry: ClargEntry): string {
  switch (entry.kind) {
    case "value":
    case "positional":
      return entry.value;
    case "toggle":
      return entry.toggled ? "true" : "false";
    case "multi":
      return entry.selected;
    case "list":
      return entry.values.join(", ");
    case "separator":
      return "";
  }
}

function displayLength(entry: ClargEntry) {
  switch (entry.kind) {
    case "toggle":
      return "false".length;
    case "multi":
      return Math.max(...entry.allowed.map((value) => value.length));
    default:
      return displayValue(entry).length;
  }
}

function copyOption(option: ClargOption): ClargOption {
  switch (option.kind) {
    case "multi":
      return { ...option, allowed: [...option.allowed] };
    case "list":
      return { ...option, values: [...option.values] };
    default:
      return { ...option };
  }
}

const copyEntry = (entry: ClargEntry): ClargEntry =>
  entry.kind === "separator" ? { ...entry } : copyOption(entry);

function checkNames({ short, long }: ClargOption) {
  if (short && (!short.startsWith("-") || short.startsWith("--") || short.length < 2)) {
    throw new InvalidOptionNameError(short, "a short name must be a single dash followed by a name");
  }
  if (long && (!long.startsWith("--") || long.length < 3)) {
    throw new InvalidOptionNameError(long, "a long name must be two dashes followed by a name");
  }
  if (!short && !long) {
    throw new InvalidOptionNameError("", "an option needs a short or a long name");
  }
}

/**
 * Owns the registered entries in registration order, along with the column widths help text needs.
 */
export class OptionRegistry {
  #entries: ClargEntry[] = [];

  #longestShort = 0;
  #longestLong = 0;
  #longestValue = 0;

  get size() {
    return this.#entries.length;
  }

  get longestShort() {
    return this.#longestShort;
  }

  get longestLong() {
    return this.#longestLong;
  }

  get longestValue() {
    return this.#longestValue;
  }

  /**
   * Registers a copy of `entry`. Later changes to the object passed in do not reach the registry.
   */
  add(entry: ClargEntry) {
    if (entry.kind === "separator") {
      this.#entries.push({ ...entry });
      return;
    }

    checkNames(entry);

    const existing = this.#options().find(
      (other) =>
        (entry.short !== "" && other.short === entry.short) || (entry.long !== "" && other.long === entry.long),
    );
    if (existing) {
      throw new DuplicateOptionError(entry, existing);
    }

    if ((entry.kind === "positional" || entry.kind === "list") && this.#entries.some((e) => e.kind === "list")) {
      throw new StructuralRegistrationError(
        `Cannot register (${optionLabel(entry)}) after a positional list. A positional list must be the last positional entry.`,
      );
    }

    if (entry.kind === "multi" && !entry.allowed.includes(entry.selected)) {
      throw new InvalidDefaultError(entry.selected, entry.allowed, optionLabel(entry));
    }

    const owned = copyOption(entry);
    this.#entries.push(owned);

    this.#longestShort = Math.max(this.#longestShort, owned.short.length);
    this.#longestLong = Math.max(this.#longestLong, owned.long.length);
    this.#noteValue(owned);
  }

  /** Returns a copy of the option registered under `name`. */
  find(name: string): ClargOption | undefined {
    const option = this.#find(name);
    return option && copyOption(option);
  }

  /**
   * Sets the value of a value or positional option and marks it resolved.
   */
  resolve(name: string, value: string) {
    const option = this.#find(name);
    if (option?.kind !== "value" && option?.kind !== "positional") throw new OptionNotFoundError(name);

    option.value = value;
    option.state = "resolved";
    this.#noteValue(option);
  }

  /**
   * Sets the value of a multi option. The selection is left as it was when `value` is not allowed.
   */
  select(name: string, value: string) {
    const option = this.#find(name);
    if (option?.kind !== "multi") throw new OptionNotFoundError(name);

    if (!option.allowed.includes(value)) {
      throw new InvalidValueError(value, option.allowed, optionLabel(option));
    }
    option.selected = value;
    this.#noteValue(option);
  }

  /** Switches a toggle on. */
  toggle(name: string) {
    const option = this.#find(name);
    if (option?.kind !== "toggle") throw new OptionNotFoundError(name);
    option.toggled = true;
  }

  /** Replaces the values of a positional list. */
  assign(name: string, values: readonly string[]) {
    const option = this.#find(name);
    if (option?.kind !== "list") throw new OptionNotFoundError(name);

    option.values = [...values];
    this.#noteValue(option);
  }

  get(name: string, as?: "string"): string;
  get(name: string, as: "number" | "integer" | "unsigned"): number;
  get(name: string, as: "boolean"): boolean;
  get(name: string, as: "list"): string[];
  get(name: string, as: ClargConversion): string | number | boolean | string[];
  get(name: string, as: ClargConversion = "string"): string | number | boolean | string[] {
    const option = this.#find(name);
    if (!option) throw new OptionNotFoundError(name);

    if (as === "list") {
      if (option.kind !== "list") throw new OptionNotFoundError(name);
      return [...option.values];
    }

    const raw = displayValue(option);
    switch (as) {
      case "string":
        return raw;
      case "number":
        return toNumber(raw, name);
      case "integer":
        return toInteger(raw, name);
      case "unsigned":
        return toUnsigned(raw, name);
      case "boolean":
        return toBoolean(raw, name);
    }
  }

  /** Yields copies of the entries in registration order. */
  *[Symbol.iterator](): Generator<ClargEntry> {
    for (const entry of this.#entries) {
      yield copyEntry(entry);
    }
  }

  #options() {
    return this.#entries.filter((entry): entry is ClargOption => entry.kind !== "separator");
  }

  #find(name: string): ClargOption | undefined {
    if (!name) return undefined;
    return this.#options().find((entry) => entry.short === name || entry.long === name);
  }

  // Widens the value column to fit the current value of `entry`.
  #noteValue(entry: ClargEntry) {
    this.#longestValue = Math.max(this.#longestValue, displayLength(entry));
  }
}

import { ClargError, MissingRequiredError, UnexpectedExtraArgumentsError } from "./errors.js";
import { formatHelp } from "./help.js";
import { OptionRegistry, displayValue } from "./registry.js";
import { Tokenizer } from "./tokenizer.js";
import type {
  ClargConfig,
  ClargConversion,
  ClargEntryView,
  ClargHelpModel,
  ClargHelpOptions,
  ClargOption,
  ClargParserOptions,
  ClargSchemaEntry,
} from "./types.js";

const primaryName = (option: ClargOption) => option.long || option.short;

export class ClargParser {
  #tokenizer: Tokenizer;
  #registry = new OptionRegistry();

  constructor({ args, inlineShortLength }: ClargParserOptions = {}) {
    this.#tokenizer = new Tokenizer(args ?? process.argv.slice(2), { inlineShortLength });
  }

  /**
   * Creates a parser from a process-style vector whose first element is the program name.
   */
  static fromArgv(argv: readonly string[], options: Omit<ClargParserOptions, "args"> = {}) {
    return new ClargParser({ ...options, args: argv.slice(1) });
  }

  public addOption(
    short: string,
    long: string,
    description: string,
    required = false,
    defaultValue: string | number | boolean = "",
  ) {
    this.#registry.add({
      kind: "value",
      short,
      long,
      description,
      required,
      value: String(defaultValue),
      state: "unset",
    });
  }

  public addToggle(short: string, long: string, description: string, toggled = false) {
    this.#registry.add({ kind: "toggle", short, long, description, toggled });
  }

  public addMultiOption(
    short: string,
    long: string,
    description: string,
    allowed: readonly string[],
    defaultValue: string,
  ) {
    this.#registry.add({
      kind: "multi",
      short,
      long,
      description,
      allowed: [...new Set(allowed)],
      selected: defaultValue,
    });
  }

  public addPositionalOption(
    short: string,
    long: string,
    description: string,
    required = false,
    defaultValue = "",
  ) {
    this.#registry.add({
      kind: "positional",
      short,
      long,
      description,
      required,
      value: defaultValue,
      state: "unset",
    });
  }

  public addPositionalList(short: string, long: string, description: string, required = false) {
    this.#registry.add({ kind: "list", short, long, description, required, values: [] });
  }

  public addSeparator(description: string) {
    this.#registry.add({ kind: "separator", short: "", long: "", description });
  }

  /**
   * Resolves every registered entry against the arguments, in registration order.
   * Missing required entries are left for `validateOptions`.
   */
  public parseOptions() {
    const reserved = this.#reservedNames();
    const positionals = this.#positionalStream();
    let cursor = 0;

    for (const entry of this.#registry) {
      if (entry.kind === "separator") continue;
      const name = primaryName(entry);

      switch (entry.kind) {
        case "value": {
          const value = this.#lookup(entry, reserved);
          if (value !== undefined) this.#registry.resolve(name, value);
          break;
        }
        case "multi": {
          const value = this.#lookup(entry, reserved);
          if (value !== undefined) this.#registry.select(name, value);
          break;
        }
        case "toggle":
          if (this.#present(entry)) this.#registry.toggle(name);
          break;
        case "positional":
          if (cursor < positionals.length) this.#registry.resolve(name, positionals[cursor++]);
          break;
        case "list":
          this.#registry.assign(name, positionals.slice(cursor));
          cursor = positionals.length;
          break;
      }
    }

    if (cursor < positionals.length) {
      throw new UnexpectedExtraArgumentsError(positionals.slice(cursor));
    }
  }

  /**
   * Throws a single `MissingRequiredError` naming every required entry the last parse left unresolved.
   */
  public validateOptions() {
    const missing: string[] = [];

    for (const entry of this.#registry) {
      if (entry.kind === "value" || entry.kind === "positional") {
        if (entry.required && entry.state === "unset") missing.push(primaryName(entry));
      } else if (entry.kind === "list") {
        if (entry.required && entry.values.length === 0) missing.push(primaryName(entry));
      }
    }

    if (missing.length > 0) {
      throw new MissingRequiredError(missing);
    }
  }

  public getOption(name: string, as?: "string"): string;
  public getOption(name: string, as: "number" | "integer" | "unsigned"): number;
  public getOption(name: string, as: "boolean"): boolean;
  public getOption(name: string, as: "list"): string[];
  public getOption(name: string, as: ClargConversion): string | number | boolean | string[];
  public getOption(name: string, as: ClargConversion = "string") {
    return this.#registry.get(name, as);
  }

  /** Whether `name` is the short or long name of a registered option. */
  public has(name: string) {
    return this.#registry.find(name) !== undefined;
  }

  /**
   * Whether the option registered under `name` appears in the arguments by its short or long name.
   */
  public isPresent(name: string) {
    const option = this.#registry.find(name);
    return option !== undefined && this.#present(option);
  }

  public positionalCount() {
    return this.#positionalStream().length;
  }

  public positionalAt(index: number): string | undefined {
    const positionals = this.#positionalStream();
    return index >= 0 && index < positionals.length ? positionals[index] : undefined;
  }

  public entries(): ClargEntryView[] {
    return this.describe().entries;
  }

  /**
   * A detached snapshot of the registry for help rendering.
   */
  public describe(): ClargHelpModel {
    const entries: ClargEntryView[] = [];

    for (const entry of this.#registry) {
      const view: ClargEntryView = {
        kind: entry.kind,
        short: entry.short,
        long: entry.long,
        description: entry.description,
        display: displayValue(entry),
        required: "required" in entry && entry.required,
      };
      if (entry.kind === "multi") view.allowed = [...entry.allowed];
      entries.push(view);
    }

    return {
      entries,
      longestShort: this.#registry.longestShort,
      longestLong: this.#registry.longestLong,
      longestValue: this.#registry.longestValue,
    };
  }

  public getHelp(options: ClargHelpOptions = {}) {
    return formatHelp(this.describe(), options);
  }

  /**
   * Prints help text to stdout, styled when stdout is a terminal.
   */
  public showHelp(options: ClargHelpOptions = {}) {
    console.log(this.getHelp({ color: Boolean(process.stdout.isTTY), ...options }));
  }

  #lookup(option: ClargOption, reserved: ReadonlySet<string>) {
    return this.#tokenizer.valueFor(option.short, reserved) ?? this.#tokenizer.valueFor(option.long, reserved);
  }

  #present(option: ClargOption) {
    return (option.short !== "" && this.#tokenizer.has(option.short)) || (option.long !== "" && this.#tokenizer.has(option.long));
  }

  #reservedNames() {
    const names = new Set<string>();
    for (const entry of this.#registry) {
      if (entry.short) names.add(entry.short);
      if (entry.long) names.add(entry.long);
    }
    return names;
  }

  // Only value and multi names take the next token as their value. Unknown names do too,
  // unless they already carry one (`--name=value`, `-xvalue`).
  #standsAlone(token: string) {
    const option = this.#registry.find(token);
    if (option) return option.kind !== "value" && option.kind !== "multi";
    if (token.startsWith("--")) return token.includes("=");

    const inline = this.#tokenizer.inlineShortLength;
    return inline > 0 && token.length > inline && this.#registry.find(token.slice(0, inline)) !== undefined;
  }

  #positionalStream() {
    return this.#tokenizer.positionals((token) => this.#standsAlone(token));
  }
}

function register(parser: ClargParser, entry: ClargSchemaEntry) {
  if (entry.kind === "separator") {
    parser.addSeparator(entry.description);
    return;
  }

  const { short = "", long = "", description = "" } = entry;

  switch (entry.kind) {
    case "value":
      parser.addOption(short, long, description, entry.required, entry.default);
      break;
    case "toggle":
      parser.addToggle(short, long, description, entry.default);
      break;
    case "multi":
      parser.addMultiOption(short, long, description, entry.allowed, entry.default);
      break;
    case "positional":
      parser.addPositionalOption(short, long, description, entry.required, entry.default);
      break;
    case "list":
      parser.addPositionalList(short, long, description, entry.required);
      break;
  }
}

/**
 * Builds a parser from a declarative schema, parses `args` (default `process.argv.slice(2)`)
 * and validates the result. Unless `disableHelp` is set, `--help` prints help and exits 0,
 * and any parse error prints the message and help and exits 1.
 */
export default function clarg(config: ClargConfig, args?: readonly string[]) {
  const parser = new ClargParser({ args, inlineShortLength: config.inlineShortLength });
  const helpOptions: ClargHelpOptions = { name: config.name, description: config.description };

  for (const entry of config.options) {
    register(parser, entry);
  }

  let systemHelp = false;
  if (!config.disableHelp && !parser.has("--help")) {
    parser.addToggle(parser.has("-h") ? "" : "-h", "--help", "Show help information");
    systemHelp = true;
  }

  try {
    let parseError: unknown;
    try {
      parser.parseOptions();
    } catch (error) {
      parseError = error;
    }

    // help wins over anything the parse complained about
    if (systemHelp && parser.isPresent("--help")) {
      parser.showHelp(helpOptions);
      process.exit(0);
    }
    if (parseError !== undefined) throw parseError;

    parser.validateOptions();
  } catch (error) {
    if (error instanceof ClargError && !config.disableHelp) {
      console.error(`\x1b[31mError: ${error.message}\x1b[0m\n`);
      parser.showHelp(helpOptions);
      process.exit(1);
    }
    throw error;
  }

  return parser;
}

export {
  BadConversionError,
  ClargError,
  DuplicateOptionError,
  InvalidDefaultError,
  InvalidOptionNameError,
  InvalidValueError,
  MissingRequiredError,
  OptionNotFoundError,
  StructuralRegistrationError,
  UnexpectedExtraArgumentsError,
} from "./errors.js";
export { formatHelp, wrapText } from "./help.js";
export { OptionRegistry } from "./registry.js";
export { Tokenizer } from "./tokenizer.js";
export type * from "./types.js";

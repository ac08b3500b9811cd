/**
 * Fields shared by every registered entry.
 */
export interface BaseClargEntry {
	/** The short-form name including its dash (e.g., '-v'), or an empty string. */
	short: string;
	/** The long-form name including its dashes (e.g., '--verbose'), or an empty string. */
	long: string;
	/** A description of the entry for use in help text. */
	description: string;
}

/**
 * An option that takes the token following its name as its value.
 */
export interface ClargValueOption extends BaseClargEntry {
	kind: "value";
	/** The current value, kept as the raw string until it is read back. */
	value: string;
	/** A boolean indicating if the option must be supplied. */
	required: boolean;
	/** Whether a parse has matched a token for this option. */
	state: ResolutionState;
}

/**
 * A boolean option set by its presence alone.
 */
export interface ClargToggleOption extends BaseClargEntry {
	kind: "toggle";
	toggled: boolean;
}

/**
 * An option restricted to a fixed, ordered set of allowed values.
 */
export interface ClargMultiOption extends BaseClargEntry {
	kind: "multi";
	/** The allowed values in declaration order. Never empty. */
	allowed: readonly string[];
	/** The current value. Always a member of `allowed`. */
	selected: string;
}

/**
 * An argument that takes exactly one positional slot.
 */
export interface ClargPositionalOption extends BaseClargEntry {
	kind: "positional";
	value: string;
	required: boolean;
	state: ResolutionState;
}

/**
 * An argument that takes every positional slot left over by the positional options.
 */
export interface ClargPositionalList extends BaseClargEntry {
	kind: "list";
	values: string[];
	required: boolean;
}

/**
 * A heading used only to group entries in help text.
 */
export interface ClargSeparator extends BaseClargEntry {
	kind: "separator";
}

/**
 * A union type for everything the registry holds.
 */
export type ClargEntry =
	| ClargValueOption
	| ClargToggleOption
	| ClargMultiOption
	| ClargPositionalOption
	| ClargPositionalList
	| ClargSeparator;

/**
 * Every entry that can be looked up by name.
 */
export type ClargOption = Exclude<ClargEntry, ClargSeparator>;

export type ClargEntryKind = ClargEntry["kind"];
export type ResolutionState = "unset" | "resolved";

/**
 * The targets `getOption` can convert a stored value to.
 */
export interface ClargConversions {
	string: string;
	number: number;
	integer: number;
	unsigned: number;
	boolean: boolean;
	list: string[];
}

export type ClargConversion = keyof ClargConversions;

/**
 * Options accepted by the `ClargParser` constructor.
 */
export interface ClargParserOptions {
	/** The tokens following the program name. Defaults to `process.argv.slice(2)`. */
	args?: readonly string[];
	/**
	 * The exact short-name length for which `-xvalue` is read as a name and an attached value.
	 * Set to 0 to turn the compact form off.
	 */
	inlineShortLength?: number;
}

/**
 * A read-only view of one entry, as consumed by the help formatter.
 */
export interface ClargEntryView {
	kind: ClargEntryKind;
	short: string;
	long: string;
	description: string;
	/** The current value rendered as text. Empty for separators. */
	display: string;
	required: boolean;
	/** The allowed values of a multi option. */
	allowed?: readonly string[];
}

/**
 * A detached snapshot of the registry for help rendering.
 */
export interface ClargHelpModel {
	entries: ClargEntryView[];
	longestShort: number;
	longestLong: number;
	longestValue: number;
}

export interface ClargHelpOptions {
	/** The name of the CLI program. */
	name?: string;
	/** A description of the CLI shown above the usage line. */
	description?: string;
	/** Wraps the output in ANSI styles. */
	color?: boolean;
	/** The column at which descriptions wrap. */
	width?: number;
}

type SchemaNames = {
	/** The short-form name including its dash (e.g., '-v'). */
	short?: string;
	/** The long-form name including its dashes (e.g., '--verbose'). */
	long?: string;
	/** A description of the entry for use in help text. */
	description?: string;
};

/**
 * One entry of the declarative schema taken by `clarg()`.
 */
export type ClargSchemaEntry =
	| (SchemaNames & { kind: "value"; required?: boolean; default?: string | number | boolean })
	| (SchemaNames & { kind: "toggle"; default?: boolean })
	| (SchemaNames & { kind: "multi"; allowed: readonly string[]; default: string })
	| (SchemaNames & { kind: "positional"; required?: boolean; default?: string })
	| (SchemaNames & { kind: "list"; required?: boolean })
	| { kind: "separator"; description: string };

/**
 * The main configuration object for the `clarg` driver.
 */
export interface ClargConfig {
	/** The name of the CLI program. */
	name?: string;
	/** A description of the CLI for use in help text. */
	description?: string;
	/** The schema entries, in the order they are registered. */
	options: readonly ClargSchemaEntry[];
	/** Skips the injected help toggle and rethrows errors instead of exiting. */
	disableHelp?: boolean;
	/** See `ClargParserOptions.inlineShortLength`. */
	inlineShortLength?: number;
}

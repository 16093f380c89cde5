/**
 * Translation defects.
 *
 * These mean a fixture (or the translator) is wrong, not that an expression
 * failed. They are never caught by the orchestrator: a scenario that hits
 * one aborts with the error as-is.
 */

/** Base class for fixture translation failures. */
export class TranslationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TranslationError";
	}
}

/** A `Value` carried a kind outside the declared set. */
export class UnknownValueKindError extends TranslationError {
	readonly kind: string;

	constructor(kind: string, known: readonly string[]) {
		super(`unknown value kind: "${kind}" (known: ${[...known].sort().join(", ")})`);
		this.name = "UnknownValueKindError";
		this.kind = kind;
	}
}

/** A type reference named a type missing from the type-name table. */
export class UnknownTypeNameError extends TranslationError {
	readonly typeName: string;

	constructor(typeName: string) {
		super(`unknown type name: "${typeName}"`);
		this.name = "UnknownTypeNameError";
		this.typeName = typeName;
	}
}

/** An object literal named a namespace with no registered factory. */
export class UnsupportedObjectNamespaceError extends TranslationError {
	readonly namespace: string;
	readonly available: string[];

	constructor(namespace: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unsupported object namespace: "${namespace}" (registered: ${sorted.join(", ")})`
				: `unsupported object namespace: "${namespace}" (no object namespaces are registered)`;
		super(msg);
		this.name = "UnsupportedObjectNamespaceError";
		this.namespace = namespace;
		this.available = sorted;
	}
}

/** A payload could not be read as the kind it was tagged with. */
export class InvalidPayloadError extends TranslationError {
	readonly kind: string;

	constructor(kind: string, detail: string) {
		super(`invalid ${kind} payload: ${detail}`);
		this.name = "InvalidPayloadError";
		this.kind = kind;
	}
}

/** A map entry whose key is not an int, uint, bool or string. */
export class InvalidMapKeyError extends TranslationError {
	readonly keyType: string;

	constructor(keyType: string) {
		super(`unsupported map key type: ${keyType}`);
		this.name = "InvalidMapKeyError";
		this.keyType = keyType;
	}
}

/** A type binding whose identifier shape does not match its kind. */
export class InvalidTypeBindingError extends TranslationError {
	readonly bindingName: string;

	constructor(bindingName: string, detail: string) {
		super(`invalid type binding "${bindingName}": ${detail}`);
		this.name = "InvalidTypeBindingError";
		this.bindingName = bindingName;
	}
}

/**
 * Object namespace registry.
 *
 * Object literals in fixtures name a fully-qualified type URL and carry an
 * ordered list of sub-fields. The registry maps each supported URL to a
 * factory that rebuilds the runtime value from those fields; any URL without
 * a factory is a translation defect.
 *
 *   const builder = new RegistryBuilder();
 *   registerWellKnownTypes(builder);
 *   builder.object("type.googleapis.com/acme.Money", (fields) => ...);
 *   const registry = builder.build();
 *
 *   translate(node, registry);
 */

import { InvalidPayloadError, UnsupportedObjectNamespaceError } from "./errors.ts";
import { readInteger } from "./payload.ts";
import { CelDuration, type CelValue } from "./runtime.ts";
import type { ObjectField, ObjectValue } from "./values.ts";

export const DURATION_NAMESPACE = "type.googleapis.com/google.protobuf.Duration";

const MAX_DURATION_NANOS = 999_999_999n;

// =====================================================================
// Factory types
// =====================================================================

export type ObjectFactory = (fields: readonly ObjectField[]) => CelValue;

// =====================================================================
// Builder
// =====================================================================

/**
 * Builder for constructing a Registry.
 *
 * Register object factories by namespace, then call build() to produce an
 * immutable Registry. Registering the same namespace twice keeps the last
 * factory.
 */
export class RegistryBuilder {
	private readonly objectFactories = new Map<string, ObjectFactory>();

	/** Register an object factory for a type URL. */
	object(namespace: string, factory: ObjectFactory): this {
		this.objectFactories.set(namespace, factory);
		return this;
	}

	/** Freeze the registry. No further registration is possible. */
	build(): Registry {
		return new Registry(new Map(this.objectFactories));
	}
}

// =====================================================================
// Registry
// =====================================================================

/** Immutable namespace → factory table, constructed via RegistryBuilder. */
export class Registry {
	private readonly objectFactories: ReadonlyMap<string, ObjectFactory>;

	constructor(objectFactories: Map<string, ObjectFactory>) {
		this.objectFactories = objectFactories;
		Object.freeze(this);
	}

	/** Rebuild an object literal through its namespace's factory. */
	translateObject(object: ObjectValue): CelValue {
		const factory = this.objectFactories.get(object.namespace);
		if (factory === undefined) {
			throw new UnsupportedObjectNamespaceError(object.namespace, [
				...this.objectFactories.keys(),
			]);
		}
		return factory(object.fields);
	}

	/** Number of registered namespaces. */
	get objectCount(): number {
		return this.objectFactories.size;
	}

	containsObject(namespace: string): boolean {
		return this.objectFactories.has(namespace);
	}

	/** Return all registered namespaces (sorted). */
	objectNamespaces(): string[] {
		return [...this.objectFactories.keys()].sort();
	}
}

// =====================================================================
// Well-known types
// =====================================================================

/**
 * `google.protobuf.Duration` from exactly two fields, `seconds` then `nanos`.
 * Each field wraps an integer special value.
 */
export function durationFromFields(fields: readonly ObjectField[]): CelDuration {
	const [secondsField, nanosField, ...extra] = fields;
	if (
		secondsField === undefined ||
		nanosField === undefined ||
		extra.length > 0 ||
		secondsField.name !== "seconds" ||
		nanosField.name !== "nanos"
	) {
		const names = fields.map((f) => f.name).join(", ");
		throw new InvalidPayloadError(DURATION_NAMESPACE, `expected fields [seconds, nanos], got [${names}]`);
	}

	const seconds = readInteger("seconds", secondsField.value.payload);
	const nanos = readInteger("nanos", nanosField.value.payload);
	if (nanos > MAX_DURATION_NANOS || nanos < -MAX_DURATION_NANOS) {
		throw new InvalidPayloadError("nanos", `${nanos} is outside ±${MAX_DURATION_NANOS}`);
	}
	if ((seconds > 0n && nanos < 0n) || (seconds < 0n && nanos > 0n)) {
		throw new InvalidPayloadError("nanos", "seconds and nanos must have the same sign");
	}
	return new CelDuration(seconds, nanos);
}

/** Register the well-known object types with the registry builder. */
export function registerWellKnownTypes(builder: RegistryBuilder): RegistryBuilder {
	return builder.object(DURATION_NAMESPACE, durationFromFields);
}

export const DEFAULT_REGISTRY: Registry = registerWellKnownTypes(new RegistryBuilder()).build();

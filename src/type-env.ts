/**
 * Type environment construction.
 *
 * Fixture type bindings become the `name → annotation` map the evaluator
 * compiles against. Annotations are type identifiers (`"int"`,
 * `"Map[string, int]"`), except for opaque bindings, which hand the
 * evaluator a ready-made message type instead of a name.
 */

import { InvalidTypeBindingError } from "./errors.ts";
import type { CelOpaque, CelValue } from "./runtime.ts";

export type TypeKind = "primitive" | "message_type" | "map_type";

/**
 * A message type the evaluator cannot resolve by name.
 *
 * `create` builds an instance from constructor-literal fields; the
 * instance answers field selections through its own lookup.
 */
export class OpaqueType {
	constructor(
		readonly typeName: string,
		readonly create: (fields: ReadonlyMap<string, CelValue>) => CelOpaque,
	) {}
}

export type Annotation = string | OpaqueType;

/** A declared variable or type: `x: int`, `m: Map[string, int]`. */
export class TypeBinding {
	readonly binding = "type";

	constructor(
		readonly name: string,
		readonly kind: TypeKind,
		readonly typeIdent: string | readonly string[],
	) {}

	annotation(): readonly [string, Annotation] {
		if (this.kind === "map_type") {
			if (typeof this.typeIdent === "string" || this.typeIdent.length !== 2) {
				throw new InvalidTypeBindingError(
					this.name,
					"map_type needs exactly two identifiers [key, value]",
				);
			}
			return [this.name, `Map[${this.typeIdent.join(", ")}]`];
		}
		if (typeof this.typeIdent !== "string") {
			throw new InvalidTypeBindingError(this.name, `${this.kind} needs a single identifier`);
		}
		return [this.name, this.typeIdent];
	}
}

/** Injects a pre-built message type in place of a translated declaration. */
export class OpaqueBinding {
	readonly binding = "opaque";

	constructor(
		readonly name: string,
		readonly type: OpaqueType,
	) {}

	annotation(): readonly [string, Annotation] {
		return [this.name, this.type];
	}
}

export type TypeEnvEntry = TypeBinding | OpaqueBinding;

/** Build the annotation map. Later bindings overwrite earlier ones with the same name. */
export function buildAnnotations(entries: Iterable<TypeEnvEntry>): Map<string, Annotation> {
	const annotations = new Map<string, Annotation>();
	for (const entry of entries) {
		const [name, annotation] = entry.annotation();
		annotations.set(name, annotation);
	}
	return annotations;
}

/** Render an annotation for logs and diagnostics. */
export function describeAnnotation(annotation: Annotation): string {
	return typeof annotation === "string" ? annotation : `<opaque ${annotation.typeName}>`;
}

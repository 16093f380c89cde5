import { CelBool, CelInt, CelOpaque, CelString, type CelValue } from "./runtime.ts";
import { OpaqueBinding, OpaqueType } from "./type-env.ts";

/**
 * Stand-ins for the conformance suite's test messages.
 *
 * Fixtures that set a container expect `<container>.TestAllTypes` and
 * `<container>.NestedTestAllTypes` to exist. Rather than translating
 * message schemas, these bindings hand the evaluator pre-built opaque types
 * whose instances answer a fixed set of fields with proto3 defaults.
 *
 * For real message types, supply your own stand-in provider.
 */
export function testAllTypesStandIns(container: string): OpaqueBinding[] {
	return [
		new OpaqueBinding(`${container}.TestAllTypes`, testAllTypes(container)),
		new OpaqueBinding(`${container}.NestedTestAllTypes`, nestedTestAllTypes(container)),
	];
}

function scalarDefaults(): Map<string, CelValue> {
	return new Map<string, CelValue>([
		["single_int32", new CelInt(0n)],
		["single_int64", new CelInt(0n)],
		["single_sint32", new CelInt(0n)],
		["single_sint64", new CelInt(0n)],
		["single_string", new CelString("")],
		["single_bool", new CelBool(false)],
	]);
}

function testAllTypes(container: string): OpaqueType {
	const typeName = `${container}.TestAllTypes`;
	return new OpaqueType(typeName, (fields) => {
		const defaults = scalarDefaults();
		return new CelOpaque(typeName, (name) => fields.get(name) ?? defaults.get(name));
	});
}

function nestedTestAllTypes(container: string): OpaqueType {
	const typeName = `${container}.NestedTestAllTypes`;
	const payloadType = testAllTypes(container);
	const type: OpaqueType = new OpaqueType(typeName, (fields) => {
		const defaults = scalarDefaults();
		return new CelOpaque(typeName, (name) => {
			const supplied = fields.get(name);
			if (supplied !== undefined) return supplied;
			if (name === "child") return type.create(new Map());
			if (name === "payload") return payloadType.create(new Map());
			return defaults.get(name);
		});
	});
	return type;
}

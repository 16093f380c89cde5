// Runtime values
export {
	BOOL_TYPE,
	BYTES_TYPE,
	CelBool,
	CelBytes,
	CelDouble,
	CelDuration,
	CelInt,
	CelList,
	CelMap,
	CelNull,
	CelOpaque,
	CelString,
	CelType,
	CelUint,
	DOUBLE_TYPE,
	DURATION_TYPE,
	INT_TYPE,
	LIST_TYPE,
	MAP_TYPE,
	NULL_TYPE,
	NULL_VALUE,
	STRING_TYPE,
	TIMESTAMP_TYPE,
	TYPE_TYPE,
	UINT_TYPE,
	celEquals,
	celToString,
	typeOf,
} from "./runtime.ts";
export type { CelMapKey, CelValue } from "./runtime.ts";
// Test-message stand-ins: import from "cel-conformance/testing"

// Fixture value model
export {
	ListValue,
	MapEntries,
	MapValue,
	ObjectField,
	ObjectValue,
	VALUE_KINDS,
	Value,
	knownTypeNames,
	resolveTypeName,
	translate,
} from "./values.ts";
export type { FixtureNode, MapEntry, ValueKind } from "./values.ts";
export type { Payload } from "./payload.ts";

// Translation errors
export {
	InvalidMapKeyError,
	InvalidPayloadError,
	InvalidTypeBindingError,
	TranslationError,
	UnknownTypeNameError,
	UnknownValueKindError,
	UnsupportedObjectNamespaceError,
} from "./errors.ts";

// Object registry
export {
	DEFAULT_REGISTRY,
	DURATION_NAMESPACE,
	Registry,
	RegistryBuilder,
	durationFromFields,
	registerWellKnownTypes,
} from "./registry.ts";
export type { ObjectFactory } from "./registry.ts";

// Escapes
export { decodeBytesLiteral, expandEscapes } from "./escapes.ts";
export type { Quote } from "./escapes.ts";

// Type environment
export {
	OpaqueBinding,
	OpaqueType,
	TypeBinding,
	buildAnnotations,
	describeAnnotation,
} from "./type-env.ts";
export type { Annotation, TypeEnvEntry, TypeKind } from "./type-env.ts";

// Error classification
export {
	ClassifierBuilder,
	ClassifierRule,
	DEFAULT_CLASSIFIER,
	ERROR_CATEGORIES,
	ErrorClassifier,
	NO_ERROR,
	UNCLASSIFIED,
	defaultClassifierBuilder,
	isErrorCategory,
} from "./classifier.ts";
export type { Classification, ErrorCategory, MatchPolicy } from "./classifier.ts";
export { ExactText, PrefixText, RegexText, TextMatcherError } from "./text-matchers.ts";
export type { TextMatcher } from "./text-matchers.ts";

// Fixture and alias-table parsing
export {
	ConfigParseError,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	PatternTooLongError,
	loadAliasTable,
	parseBindings,
	parseClassifierConfig,
	parseExpectation,
	parseFixtureNode,
	parseTypeBinding,
} from "./config.ts";
export type { Binding } from "./config.ts";

// Scenario, evaluation, verification
export { Scenario, ScenarioStateError } from "./scenario.ts";
export type { Expectation, Outcome } from "./scenario.ts";
export { EvaluationError } from "./evaluator.ts";
export type { Activation, CompileRequest, Evaluator, Program } from "./evaluator.ts";
export { applyBindings, evaluateExpression, evaluateScenario } from "./orchestrator.ts";
export type { EvaluateOptions, StandInProvider } from "./orchestrator.ts";
export {
	VerificationError,
	verifyError,
	verifyNoError,
	verifyOutcome,
	verifyValue,
} from "./verifier.ts";
export type { VerifyOptions } from "./verifier.ts";

// Settings and logging
export {
	DEFAULT_SETTINGS,
	LOG_LEVEL_ENV,
	MATCH_ENV,
	loadSettings,
	matchPolicyFrom,
} from "./settings.ts";
export type { Settings } from "./settings.ts";
export { LOG_LEVELS, createLogger, silentLogger } from "./logger.ts";
export type { LogLevel, Logger } from "./logger.ts";

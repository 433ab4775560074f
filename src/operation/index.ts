export type {
	AuthTag,
	Field,
	FieldValue,
	HttpMethod,
	ListValue,
	Operation,
	OperationInit,
	PathParams,
} from "./types.js";
export { defineOperation, hasQuery, renderPath } from "./operation.js";
export {
	type ListStyle,
	type Pair,
	decodeQuery,
	encodeJsonBody,
	encodePairs,
	encodeQuery,
	flattenFields,
	revertBracketKeys,
} from "./query.js";

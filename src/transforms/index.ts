import type { Rule } from "../pipeline.js";
import {
  createUser,
  describeTable,
  informationSchemaFsColumnsSnowflake,
  informationSchemaFsTablesExt,
  setSchema,
  showKeys,
  showObjectsTables,
  showSchemas,
  showUsers,
} from "./catalog.js";
import {
  createDatabase,
  dropSchemaCascade,
  extractCommentOnColumns,
  extractCommentOnTable,
  extractTextLength,
  tag,
} from "./ddl.js";
import { random, regexReplace, regexSubstr, sample, toDate, toDecimal, toTimestamp, toTimestampNtz } from "./functions.js";
import { identifier, upperCaseUnquotedIdentifiers, valuesColumns } from "./identifiers.js";
import {
  arrayAggToJson,
  arrayAggWithinGroup,
  arraySize,
  flatten,
  indicesToJsonExtract,
  jsonExtractCasedAsVarchar,
  jsonExtractCastAsVarchar,
  jsonExtractPrecedence,
  objectConstruct,
  tryParseJson,
} from "./json.js";
import { floatToDouble, integerPrecision, semiStructuredTypes, timestampNtzNs } from "./types.js";

export * from "./catalog.js";
export * from "./ddl.js";
export * from "./functions.js";
export * from "./identifiers.js";
export * from "./json.js";
export * from "./types.js";
export { parseDuckDB, sqlIdentifier, sqlString } from "./sql.js";

/**
 * The Snowflake to DuckDB catalog, in the order it runs. Each call returns a new frozen
 * list, so callers may derive their own catalog from it.
 */
export function defaultRules(): readonly Rule[] {
  return Object.freeze([
    upperCaseUnquotedIdentifiers,
    setSchema,
    createDatabase,
    describeTable,
    extractCommentOnTable,
    extractCommentOnColumns,
    informationSchemaFsColumnsSnowflake,
    informationSchemaFsTablesExt,
    dropSchemaCascade,
    tag,
    semiStructuredTypes,
    tryParseJson,
    indicesToJsonExtract,
    jsonExtractCastAsVarchar,
    jsonExtractCasedAsVarchar,
    jsonExtractPrecedence,
    flatten,
    regexReplace,
    regexSubstr,
    valuesColumns,
    toDate,
    toDecimal,
    toTimestampNtz,
    toTimestamp,
    objectConstruct,
    timestampNtzNs,
    floatToDouble,
    integerPrecision,
    extractTextLength,
    sample,
    arraySize,
    random,
    identifier,
    arrayAggWithinGroup,
    arrayAggToJson,
    showSchemas,
    showObjectsTables,
    showKeys("PRIMARY"),
    showKeys("UNIQUE"),
    showKeys("FOREIGN"),
    showUsers,
    createUser,
  ]);
}

export { Dialect, type DialectType, type GenerateOptions } from "./dialect.js";
export { DuckDB } from "./duckdb.js";
export { Snowflake } from "./snowflake.js";

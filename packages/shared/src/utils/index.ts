// Shared utilities
export { buildRedirectMap, fromStaticMap, validateRecord } from "./redirect-map.js";
export { parseYamlRecords, parseJsonRecords } from "./parse.js";

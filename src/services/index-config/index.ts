export {
  defineIndexConfig,
  toSnakeCase,
  INDEX_CONFIG_ATTRIBUTES,
} from "./define";
export type {
  IndexConfig,
  IndexConfigAttribute,
  IndexConfigFields,
} from "./define";
export { IndexConfigError } from "./errors";

export {
  Settings,
  Synonyms,
  StringList,
  PaginationSettings,
  FacetingSettings,
  DistinctAttribute,
} from "./types";
export { SettingsBuilder } from "./builder";
export type { SettingPath } from "./operations";

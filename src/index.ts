export {
  NeoFieldsSchema,
  ApproachFieldsSchema,
  parseNeoFields,
  parseApproachFields,
  type RawValue,
  type NeoFields,
  type ApproachFields,
  type NeoRow,
  type ApproachRow,
} from "#types";
export {
  NearEarthObject,
  CloseApproach,
  UnlinkedApproachError,
  FieldCoercionError,
  type NeoOptions,
} from "#models/index";
export { cdToDate, dateToString, DateFormatError } from "#helpers/dates";
export {
  linkApproaches,
  indexByDesignation,
  LinkError,
  type LinkIssue,
  type LinkIssueKind,
  type LinkOptions,
  type LinkResult,
} from "#catalog/linker";
export { buildCatalog, type Catalog } from "#catalog/catalog";
export {
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG,
  type CatalogConfig,
} from "#config";
export { createLogger, type Logger, type LoggerOptions } from "./log.js";

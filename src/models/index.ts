export { NearEarthObject, type NeoOptions } from "./neo.js";
export { CloseApproach, UnlinkedApproachError } from "./approach.js";
export { FieldCoercionError } from "./coerce.js";

export { jsonEqual, mergeDeep, replaceDeep, stripDeep } from "./values.js";

export { inferHelperName, type InferredHelper } from "./helper-name.js";
export { inferLayout } from "./layout.js";

export { validateOptions, validateOptionValue, parseOptionArgument } from "./validator.js";

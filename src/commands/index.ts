export {
  handleError,
  runFactsCommand,
  type FactsCommandDeps,
  type FactsCommandOptions,
} from "./facts.js";
export { parseTimeout } from "./options.js";

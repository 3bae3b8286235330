export {
  type WriteFn,
  emitRuleSet,
  findDuplicateIds,
  writeRuleSet,
} from "./ruleset-writer.js";
export { parseRuleIds } from "./rule-ids.js";

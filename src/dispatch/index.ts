export { createRule, defineRule } from './rule';
export type {
  DispatchScope,
  Rule,
  RuleConstraints,
  RuleFactory,
  RuleHandler,
  RuleTarget,
  TargetNode
} from './rule';
export { Visitor } from './visitor';
export type { RuleSource } from './visitor';

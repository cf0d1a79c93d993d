// Planner module exports

export { Planner, type PlannerOptions } from "./planner";
export { PostOptimizer, type PostOptimizerPass, defaultPostPasses } from "./optimizer";
export { ConstantCallFoldPass } from "./passes/constant-call-fold";
export { CoalesceFoldPass } from "./passes/coalesce-fold";

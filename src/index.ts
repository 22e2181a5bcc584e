#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

export { createCanaryTasks } from "./services/canary/canary-tasks.js";
export type { CanaryTasks, CanaryTasksOptions } from "./services/canary/canary-tasks.js";
export type { Canary, CanaryAccount, CanaryServiceIntegration } from "./services/canary/types.js";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main, isCliInvocation };

#!/usr/bin/env node

/**
 * sdd CLI Router
 *
 * Routes workflow commands using commander.js.
 */

import { Command } from "commander";

import { registerApproveCommand } from "@/cli/commands/approve/approve.js";
import { registerCheckCommand } from "@/cli/commands/check/check.js";
import { registerFinalizeCommand } from "@/cli/commands/finalize/finalize.js";
import { registerInitCommand } from "@/cli/commands/init/init.js";
import { registerInstallCommand } from "@/cli/commands/install/install.js";
import { registerPlansCommand } from "@/cli/commands/plans/plans.js";
import { registerReviewCommand } from "@/cli/commands/review/review.js";
import { registerSelectCommand } from "@/cli/commands/select/select.js";
import { registerStatusCommand } from "@/cli/commands/status/status.js";
import { registerTasksCommand } from "@/cli/commands/tasks/tasks.js";
import { registerTestPlanCommand } from "@/cli/commands/test-plan/testPlan.js";
import { registerWorktreesCommand } from "@/cli/commands/worktrees/worktrees.js";
import { setSilentMode, setVerboseMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

const program = new Command();
const version = getCurrentPackageVersion() ?? "unknown";

program
  .name("sdd")
  .version(version)
  .description(`sdd - spec-driven multi-agent change workflow v${version}`)
  .option("-s, --silent", "Suppress all output except errors")
  .option("-v, --verbose", "Print debug output")
  .hook("preAction", () => {
    const globalOpts = program.opts<{ silent?: boolean; verbose?: boolean }>();
    setSilentMode({ silent: globalOpts.silent ?? false });
    setVerboseMode({ verbose: globalOpts.verbose ?? false });
  })
  .addHelpText(
    "after",
    `
Workflow:
  $ sdd init
  $ sdd plans --name "add retry policy"
  $ sdd review && sdd tasks
  $ sdd approve --by alice
  $ sdd worktrees --agents 2
  $ sdd test-plan --coverage none
  $ sdd select
  $ sdd finalize --agent agent1
  $ sdd check --base origin/main
`,
  );

// Register all commands
registerInstallCommand({ program });
registerInitCommand({ program });
registerPlansCommand({ program });
registerReviewCommand({ program });
registerTasksCommand({ program });
registerApproveCommand({ program });
registerCheckCommand({ program });
registerWorktreesCommand({ program });
registerTestPlanCommand({ program });
registerSelectCommand({ program });
registerFinalizeCommand({ program });
registerStatusCommand({ program });

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);

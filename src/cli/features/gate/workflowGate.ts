/**
 * Workflow gate
 *
 * Decides whether a set of changed paths satisfies the spec-driven rules:
 * docs-only changes always pass, code changes need a spec update plus one
 * change directory carrying the decision, tasks and test plan artifacts.
 */

import { GateViolationError } from "@/cli/errors.js";

import type { ChangeState } from "@/cli/features/state/types.js";

/**
 * Where things live in the repository, as repository-relative prefixes
 */
export type GateLayout = {
  docsRoot: string;
  specsDir: string;
  changesDir: string;
  codePrefixes: Array<string>;
  buildManifests: Array<string>;
  specExtensions: Array<string>;
};

export const DEFAULT_GATE_LAYOUT: GateLayout = {
  docsRoot: "docs/",
  specsDir: "docs/sdd/specs/",
  changesDir: "docs/sdd/changes/",
  codePrefixes: ["src/", "tests/"],
  buildManifests: ["Cargo.toml", "Cargo.lock", "package.json", "package-lock.json"],
  specExtensions: [".md"],
};

/** Terminal artifacts a change directory must touch for code changes */
export const REQUIRED_ARTIFACTS = {
  decision: "90_decision.md",
  tasks: "40_tasks.md",
  testPlan: "50_test_plan.md",
} as const;

export type ArtifactFlags = Record<keyof typeof REQUIRED_ARTIFACTS, boolean>;

export type CheckOutcome = "no-changes" | "docs-only" | "non-code" | "verified";

/**
 * Labels of the per-change workflow; only the approval gate and the
 * finalize spec check are enforced
 */
export const WORKFLOW_STAGES = [
  "created",
  "indexed",
  "reviewed",
  "tasked",
  "approved",
  "worktrees-created",
  "test-planned",
  "selected",
  "archived",
] as const;

export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

/**
 * Furthest stage the recorded state shows; selection leaves no state behind
 * and archived changes are dropped, so neither is ever reported
 * @param args - Arguments
 * @param args.change - Change state
 *
 * @returns Stage label
 */
export const inferStage = (args: { change: ChangeState }): WorkflowStage => {
  const { change } = args;
  const purposes = change.codex_threads.map((thread) => thread.purpose);

  if (purposes.some((purpose) => purpose.startsWith("test_plan_"))) {
    return "test-planned";
  }
  if (change.base_commit != null) {
    return "worktrees-created";
  }
  if (change.approved) {
    return "approved";
  }
  if (purposes.includes("tasks")) {
    return "tasked";
  }
  if (purposes.includes("review")) {
    return "reviewed";
  }
  if (change.file_index_hash != null) {
    return "indexed";
  }
  return "created";
};

export const isDocsOnly = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): boolean => {
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;
  return args.changed.every((p) => p.startsWith(layout.docsRoot));
};

export const touchesCode = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): boolean => {
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;
  return args.changed.some(
    (p) =>
      layout.codePrefixes.some((prefix) => p.startsWith(prefix)) ||
      layout.buildManifests.includes(p),
  );
};

export const hasSpecUpdate = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): boolean => {
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;
  return args.changed.some(
    (p) =>
      p.startsWith(layout.specsDir) &&
      layout.specExtensions.some((ext) => p.endsWith(ext)),
  );
};

/**
 * Group changed paths by change directory and flag the artifacts each touched
 * @param args - Grouping arguments
 * @param args.changed - Changed repository-relative paths
 * @param args.layout - Repository layout
 *
 * @returns Change directory name -> artifact flags
 */
export const groupChangeArtifacts = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): Map<string, ArtifactFlags> => {
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;
  const groups = new Map<string, ArtifactFlags>();

  for (const changedPath of args.changed) {
    if (!changedPath.startsWith(layout.changesDir)) {
      continue;
    }
    const rest = changedPath.slice(layout.changesDir.length);
    const groupKey = rest.split("/")[0];
    if (groupKey == null || groupKey === "") {
      continue;
    }

    let flags = groups.get(groupKey);
    if (flags == null) {
      flags = { decision: false, tasks: false, testPlan: false };
      groups.set(groupKey, flags);
    }

    if (changedPath.endsWith(`/${REQUIRED_ARTIFACTS.decision}`)) {
      flags.decision = true;
    }
    if (changedPath.endsWith(`/${REQUIRED_ARTIFACTS.tasks}`)) {
      flags.tasks = true;
    }
    if (changedPath.endsWith(`/${REQUIRED_ARTIFACTS.testPlan}`)) {
      flags.testPlan = true;
    }
  }

  return groups;
};

/**
 * Find a single change directory that touched all three artifacts
 * @param args - Arguments
 * @param args.groups - Output of groupChangeArtifacts
 *
 * @returns The complete group's key, or null when none is complete
 */
export const findCompleteArtifactGroup = (args: {
  groups: Map<string, ArtifactFlags>;
}): string | null => {
  for (const [groupKey, flags] of args.groups) {
    if (flags.decision && flags.tasks && flags.testPlan) {
      return groupKey;
    }
  }
  return null;
};

/**
 * Run the full check over a set of changed paths
 * @param args - Check arguments
 * @param args.changed - Changed repository-relative paths
 * @param args.layout - Repository layout
 *
 * @throws GateViolationError naming the unmet requirement
 *
 * @returns Why the check passed
 */
export const checkChangedPaths = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): CheckOutcome => {
  const { changed } = args;
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;

  if (changed.length === 0) {
    return "no-changes";
  }
  if (isDocsOnly({ changed, layout })) {
    return "docs-only";
  }
  if (!touchesCode({ changed, layout })) {
    return "non-code";
  }

  if (!hasSpecUpdate({ changed, layout })) {
    throw new GateViolationError({
      message: `spec update required: code changes need ${layout.specsDir}<spec>${layout.specExtensions[0] ?? ""} to change as well`,
    });
  }

  const groups = groupChangeArtifacts({ changed, layout });
  if (findCompleteArtifactGroup({ groups }) == null) {
    const names = Object.values(REQUIRED_ARTIFACTS).join(", ");
    throw new GateViolationError({
      message: `artifacts required: code changes need ${names} under a single ${layout.changesDir}<id>_<name>/ directory`,
    });
  }

  return "verified";
};

/**
 * Finalize's check: the selected variant must have updated a spec
 * @param args - Check arguments
 * @param args.changed - Paths changed on the variant's branch
 * @param args.layout - Repository layout
 *
 * @throws GateViolationError when no spec document changed
 */
export const requireSpecUpdate = (args: {
  changed: ReadonlyArray<string>;
  layout?: GateLayout;
}): void => {
  const layout = args.layout ?? DEFAULT_GATE_LAYOUT;
  if (!hasSpecUpdate({ changed: args.changed, layout })) {
    throw new GateViolationError({
      message: `spec update required: finalize needs ${layout.specsDir}<spec>${layout.specExtensions[0] ?? ""} to change on the selected branch`,
    });
  }
};

/**
 * Build a gate layout from configured code locations
 * @param args - Layout arguments
 * @param args.codePrefixes - Code path prefixes
 * @param args.buildManifests - Build manifest file names
 *
 * @returns Layout with the default docs locations
 */
export const createGateLayout = (args: {
  codePrefixes: Array<string>;
  buildManifests: Array<string>;
}): GateLayout => {
  return {
    ...DEFAULT_GATE_LAYOUT,
    codePrefixes: [...args.codePrefixes],
    buildManifests: [...args.buildManifests],
  };
};

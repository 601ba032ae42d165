export {
  branchExists,
  createWorktree,
  deleteBranch,
  listWorktrees,
  pruneWorktrees,
  removeWorktree,
  resolveWorktreePath,
  type CreateWorktreeParams,
  type WorktreeInfo,
} from './worktree.js';
export {
  BRANCH_TEMPLATE_ENV_VAR,
  DEFAULT_BRANCH_TEMPLATE,
  generateBranchName,
  generateConfiguredBranchName,
  resolveBranchTemplate,
  type BranchNameContext,
} from './branchName.js';
export {
  WorkspaceManager,
  WorkspaceRemovalError,
  type AllocatedWorkspace,
  type WorkspaceManagerOptions,
  type WorkspaceRemovalErrorCode,
  type WorkspaceSnapshot,
} from './workspaceManager.js';
export {
  DEFAULT_ORPHAN_MAX_AGE_MS,
  OrphanReaper,
  type ActiveRunIndex,
  type ReapCandidate,
  type ReapFailure,
  type ReapOptions,
  type ReapReport,
  type ReapSkip,
  type ReapSkipReason,
} from './orphanReaper.js';

// Public API — report pipeline and review actions for programmatic use

export {
  abandonCommand,
  actionCommand,
  codeReviewCommand,
  deleteDraftCommand,
  publishCommand,
  runAction,
  setReviewersCommand,
  submitCommand,
  verifyCommand,
  type ReviewAction,
} from "./actions.js";
export { DEFAULT_LABELS, loadConfig, loadEnvConfig, resolveSettings, type Settings } from "./config.js";
export { ConfigurationError, ExecutionError, type MalformedRecord } from "./errors.js";
export { spawnRunner } from "./exec.js";
export { displayWidth, relativeAge, truncate } from "./format.js";
export { buildQueryCommand, DEFAULT_FILTER, DEFAULT_PORT, GerritClient } from "./gerrit.js";
export { downloadChange, parseRemoteUrl, pushForReview, type RemoteInfo } from "./git.js";
export { parseReviews, toReview } from "./parser.js";
export {
  APPROVED_GLYPH,
  columnsForWidth,
  REJECTED_GLYPH,
  renderApprovals,
  renderTable,
  rowIndex,
  scoreCell,
} from "./renderer.js";
export { generateReport, type ReportOptions } from "./report.js";
export type {
  Approval,
  CommandResult,
  CommandRunner,
  ConnectionConfig,
  Label,
  LabelSet,
  Review,
} from "./types.js";

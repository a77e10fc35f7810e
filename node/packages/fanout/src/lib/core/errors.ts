/**
 * Error raised for a malformed workflow, matrix or step declaration.
 * Always raised before any job is dispatched.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Raised when a run is requested for an event kind the workflow does not
 * listen to
 */
export class TriggerMismatchError extends Error {
  constructor(
    readonly workflowName: string,
    readonly eventKind: string,
  ) {
    super(`Workflow "${workflowName}" is not triggered by "${eventKind}"`);
    this.name = "TriggerMismatchError";
  }
}

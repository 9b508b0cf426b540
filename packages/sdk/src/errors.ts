/** One problem found while validating an audit record */
export interface RecordIssue {
  /** Dotted field path, e.g. "paragraphs.2.length". Empty for record-level issues. */
  path: string;
  message: string;
}

/** Thrown by defineRecord() when the input cannot become a valid SEORecord. */
export class RecordValidationError extends Error {
  readonly issues: RecordIssue[];

  constructor(issues: RecordIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    super(`pagehealth: invalid audit record: ${summary}`);
    this.name = "RecordValidationError";
    this.issues = issues;
  }
}

/** Thrown by storage adapters when the persisted store cannot be read. */
export class AuditStoreError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditStoreError";
    this.filePath = filePath;
  }
}

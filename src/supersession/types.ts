/**
 * Supersession tracker contracts.
 */

/**
 * Outcome of registering "documentId supersedes supersededPath".
 */
export interface RegistrationResult {
  success: boolean;
  /** Why registration failed, or a data-quality note on success */
  warning?: string;
  /** Documents behind documentId in its lineage after registration */
  chainDepth: number;
}

/**
 * Supersession state of one document.
 */
export interface SupersessionInfo {
  documentId: string;
  /** Path this document declares it supersedes */
  supersedesPath: string | null;
  /** Resolved id of that path, null when unresolved or absent */
  supersedesId: string | null;
  /** The document that supersedes this one */
  supersededById: string | null;
  isSuperseded: boolean;
  /** Hops between this document and the current version (0 = current) */
  chainPosition: number;
  /** Newest reachable version of this lineage */
  currentVersionId: string;
  /** decayFactor^chainPosition, or 1.0 when a cycle was detected */
  multiplier: number;
  cycleDetected: boolean;
  /** The forward walk stopped at maxChainDepth */
  depthExceeded: boolean;
}

export interface RemovalResult {
  /** True when the predecessor now links directly to the successor */
  chainReconnected: boolean;
}

export type ChainIssueKind =
  | 'cycle'
  | 'dangling-target'
  | 'missing-target'
  | 'missing-document'
  | 'depth-exceeded';

export interface ChainIssue {
  kind: ChainIssueKind;
  /** Documents involved, sorted */
  documentIds: string[];
  message: string;
}

export interface ReconcileResult {
  /** Unresolved targets that now point at an indexed document */
  resolved: number;
  /** Targets still not indexed */
  stillDangling: number;
  /** Targets found but refused (cycle or existing successor) */
  rejected: number;
}

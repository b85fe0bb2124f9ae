export type CertificateStatus = 'OK' | 'WARNING' | 'ERROR';

export type ProbeErrorKind =
  | 'ConnectionError'
  | 'HandshakeError'
  | 'CertificateParseError'
  | 'Error';

export interface ProbeTarget {
  host: string;
  port: number;
}

export interface CertificateOutcome extends ProbeTarget {
  status: 'OK' | 'WARNING';
  expiry: Date;
  daysLeft: number;
  error: '';
}

export interface FailedOutcome extends ProbeTarget {
  status: 'ERROR';
  expiry?: undefined;
  daysLeft?: undefined;
  error: string;
  errorKind: ProbeErrorKind;
}

export type ProbeOutcome = CertificateOutcome | FailedOutcome;

export type BucketLabel =
  | 'Expired'
  | '0-7 days'
  | '8-30 days'
  | '31-90 days'
  | '91-365 days'
  | '>365 days';

export interface BucketCount {
  label: BucketLabel;
  count: number;
}

export interface BatchSummary {
  total: number;
  ok: number;
  warning: number;
  error: number;
}

export interface BatchResult {
  /** Outcomes in input order */
  outcomes: readonly ProbeOutcome[];
  summary: BatchSummary;
  buckets: readonly BucketCount[];
  port: number;
  warnDays: number;
  workers: number;
  startedAt: Date;
  completedAt: Date;
  /** True when the run was aborted before every host was dispatched */
  cancelled: boolean;
}

export interface ProgressEvent {
  completed: number;
  total: number;
  /** completed / total, in [0, 1] */
  fraction: number;
  outcome: ProbeOutcome;
}

export type ProgressListener = (event: ProgressEvent) => void;

export type Clock = () => Date;

/** JSON wire shape of a ProbeOutcome */
export interface SerializedOutcome {
  host: string;
  port: number;
  expiry: string | null;
  daysLeft: number | null;
  status: CertificateStatus;
  error: string;
  errorKind?: ProbeErrorKind;
}

export interface SerializedBatchResult {
  outcomes: SerializedOutcome[];
  summary: BatchSummary;
  buckets: BucketCount[];
  port: number;
  warnDays: number;
  workers: number;
  startedAt: string;
  completedAt: string;
  cancelled: boolean;
}

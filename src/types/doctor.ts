export type DoctorCheckKind = 'binary' | 'config' | 'filesystem' | 'service-endpoint';

export type DoctorSeverity = 'critical' | 'warning';

export interface DoctorCheck {
  kind: DoctorCheckKind;
  name: string;
  description: string;
  /** How much a failure of this check matters for the listener. */
  severity: DoctorSeverity;
  remediation: string;
}

export interface DoctorCheckResult {
  check: DoctorCheck;
  passed: boolean;
  /** Descriptive actual value when relevant; never a secret. */
  actual?: string;
  message: string;
}

export type DoctorStatus = 'ok' | 'degraded' | 'critical';

export interface DoctorReport {
  status: DoctorStatus;
  results: DoctorCheckResult[];
  checkedAt: string;
  passed: number;
  failed: number;
}

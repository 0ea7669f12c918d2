// Shared data models

/**
 * One row of the NPPES endpoint file. Only positions 0 (NPI), 1 (endpoint type)
 * and 3 (endpoint value) are read.
 */
export type InputRecord = readonly string[];

export type EndpointType = 'DIRECT' | 'EMAIL' | 'OTHER';

export const OUTPUT_FIELDNAMES = [
  'NPI',
  'EndpointType',
  'Endpoint',
  'ValidEmail',
  'ValidDirect',
  'cert_protocol'
] as const;

export type OutputField = typeof OUTPUT_FIELDNAMES[number];

export type OutputRecord = Record<OutputField, string>;

export type CertProtocol = 'ldap' | 'dns';

export type ValidationOutcome =
  | 'NotDirectEndpoint'
  | 'DirectSuccessLdap'
  | 'DirectSuccessDns'
  | 'DirectFailedButEmailValid'
  | 'DirectFailedAndEmailInvalid'
  | 'EmailValid'
  | 'EmailInvalid';

export interface DispatchResult {
  outcome: ValidationOutcome;
  validEmail?: boolean; // Set whenever the email check ran
  validDirect?: boolean; // Set for DIRECT endpoints only
  certProtocol?: CertProtocol;
}

export type OutputMode = 'fresh' | 'append';

export interface ProcessingSession {
  existingRows: number;
  mode: OutputMode;
  totalRowsInOutput: number;
  rowsProcessed: number;
}

export type SessionState = 'complete' | 'interrupted' | 'aborted';

export interface SessionSummary {
  state: SessionState;
  outputPath: string;
  existingRows: number;
  rowsProcessed: number;
  totalRowsInOutput: number;
  resumeFromRow: number;
}

export interface CertificateDiscoveryResult {
  found: boolean;
  method?: string;
}

/**
 * Email syntax check consumed by the dispatcher
 */
export interface EmailValidator {
  validate(address: string): boolean;
}

/**
 * Direct certificate lookup consumed by the dispatcher
 */
export interface CertificateDiscovery {
  discover(endpointAddress: string, verifyChain: boolean): Promise<CertificateDiscoveryResult>;
}

/**
 * Console-compatible sink for status and progress lines
 */
export type Reporter = Pick<Console, 'log' | 'warn' | 'error'>;

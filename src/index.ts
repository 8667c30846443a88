/**
 * Bulk Mail Verifier
 *
 * Classifies lists of email addresses through format validation, MX
 * resolution and an SMTP mailbox probe, or a remote verification API.
 */

// Re-export types
export type {
  VerificationStatus,
  VerificationMode,
  DomainErrorKind,
  MailboxErrorKind,
  ApiErrorKind,
  Candidate,
  MxRecord,
  DomainResolution,
  DomainCacheEntry,
  ProbeOutcome,
  Verifier,
  VerificationResult,
  Stats,
  VerifyOptions,
  RunOutput,
} from './types';
export { VERIFICATION_STATUSES } from './types';

export {
  VerificationOrchestrator,
  verifyEmails,
  DEFAULT_OPTIONS,
  DEFAULT_CONCURRENCY,
} from './orchestrator';
export { ResultAggregator, summarize } from './aggregator';
export { VerifierError, ConfigurationError, InputError } from './errors';
export { loadConfig, loadEnvFile, ENV_VARS } from './config';
export { extractFromCsv, extractFromText, extractFromMessage, readCandidates } from './input';
export {
  validAddresses,
  formatValidCsv,
  formatTextReport,
  buildJsonReport,
  writeReports,
  REPORT_FILES,
} from './report';
export type { ReportFormat, JsonReport, WriteReportsOptions } from './report';
export { VERSION } from './version';

// Building blocks for direct use
export {
  isValidFormat,
  checkSyntax,
  ADDRESS_LIMITS,
  extractDomain,
  extractLocalPart,
  normalizeEmail,
  createCandidate,
} from './validators/format';
export type { SyntaxProblem } from './validators/format';
export { lookupMx, DomainResolver } from './validators/dns';
export { smtpProbe, probeHosts } from './validators/smtp';
export type { SmtpResult, SmtpStatus, SmtpFailure } from './validators/smtp';
export { SmtpVerifier } from './verifiers/smtp';
export { ApiVerifier } from './verifiers/api';
export { DomainCache } from './cache';

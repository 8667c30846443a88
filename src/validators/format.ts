/**
 * Address syntax
 *
 * Splits raw input into candidates and decides whether a candidate is
 * worth any network work. No I/O: a candidate failing here is reported
 * as invalid_syntax and never reaches DNS or SMTP.
 */

import type { Candidate } from '../types';

/**
 * Dot-separated runs of RFC 5322 atext
 *
 * Rules out leading, trailing and doubled dots as well as quoted local parts.
 */
const LOCAL_PART_PATTERN = /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+)*$/;

const DOMAIN_LABEL_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;

const TLD_PATTERN = /^[A-Za-z]{2,}$/;

/**
 * C0 controls, space and DEL; none may appear unquoted in an address
 */
const CONTROL_OR_SPACE_PATTERN = /[\u0000-\u0020\u007f]/;

/**
 * RFC 5321 size limits, in characters
 */
export const ADDRESS_LIMITS = {
  address: 254,
  localPart: 64,
  domain: 253,
  label: 63,
} as const;

/**
 * First rule a candidate breaks
 */
export type SyntaxProblem =
  | 'empty'
  | 'control_or_space'
  | 'missing_part'
  | 'local_part_too_long'
  | 'domain_too_long'
  | 'address_too_long'
  | 'bad_local_part'
  | 'bad_domain';

function splitAddress(email: string): { localPart: string; domain: string } | null {
  const atIndex = email.lastIndexOf('@');
  if (atIndex === -1) {
    return null;
  }
  return { localPart: email.slice(0, atIndex), domain: email.slice(atIndex + 1) };
}

function isValidDomain(domain: string): boolean {
  const labels = domain.split('.');
  const tld = labels[labels.length - 1];

  return labels.length >= 2
    && tld !== undefined
    && TLD_PATTERN.test(tld)
    && labels.every((label) => label.length <= ADDRESS_LIMITS.label && DOMAIN_LABEL_PATTERN.test(label));
}

/**
 * Finds the first syntax rule a candidate breaks
 *
 * @returns The problem, or null when the candidate may be verified
 *
 * @example
 * ```ts
 * checkSyntax(createCandidate('bad@@syntax')); // 'bad_local_part'
 * checkSyntax(createCandidate('user@localhost')); // 'bad_domain'
 * ```
 */
export function checkSyntax(candidate: Candidate): SyntaxProblem | null {
  const { address, localPart, domain } = candidate;

  if (address.length === 0) return 'empty';
  if (CONTROL_OR_SPACE_PATTERN.test(address)) return 'control_or_space';
  if (localPart === null || domain === null) return 'missing_part';
  if (localPart.length > ADDRESS_LIMITS.localPart) return 'local_part_too_long';
  if (domain.length > ADDRESS_LIMITS.domain) return 'domain_too_long';
  if (address.length > ADDRESS_LIMITS.address) return 'address_too_long';
  if (!LOCAL_PART_PATTERN.test(localPart)) return 'bad_local_part';
  if (!isValidDomain(domain)) return 'bad_domain';

  return null;
}

/**
 * Whether a candidate passes every syntax rule
 *
 * @example
 * ```ts
 * isValidFormat(createCandidate('user@example.com')); // true
 * isValidFormat(createCandidate('user name@example.com')); // false
 * ```
 */
export function isValidFormat(candidate: Candidate): boolean {
  return checkSyntax(candidate) === null;
}

/**
 * Lower-cased domain after the last '@', or null when there is none
 */
export function extractDomain(email: string): string | null {
  const parts = splitAddress(email);
  return parts && parts.domain ? parts.domain.toLowerCase() : null;
}

/**
 * Everything before the last '@', or null when that is empty or absent
 */
export function extractLocalPart(email: string): string | null {
  const parts = splitAddress(email);
  return parts && parts.localPart ? parts.localPart : null;
}

/**
 * Trims surrounding whitespace and lower-cases the domain
 *
 * The local part is kept as written: RFC 5321 leaves its case significance
 * to the receiving host.
 *
 * @returns The normalized address, or null for blank input
 *
 * @example
 * ```ts
 * normalizeEmail('  User@EXAMPLE.COM  '); // 'User@example.com'
 * ```
 */
export function normalizeEmail(email: string): string | null {
  const trimmed = email.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const parts = splitAddress(trimmed);
  return parts ? `${parts.localPart}@${parts.domain.toLowerCase()}` : trimmed;
}

/**
 * Builds the immutable candidate for a raw input string
 *
 * Never fails: malformed input still becomes a candidate so that it gets
 * its own result.
 */
export function createCandidate(raw: string): Candidate {
  const address = normalizeEmail(raw) ?? '';

  return Object.freeze({
    raw,
    address,
    localPart: extractLocalPart(address),
    domain: extractDomain(address),
  });
}

/**
 * Identity Types
 *
 * A principal is the opaque identity of a caller or account holder.
 * Authentication happens before a principal reaches the ledger; the ledger
 * only compares principals for equality.
 */

/**
 * Opaque caller / account-holder identity (non-empty string).
 */
export type Principal = string;

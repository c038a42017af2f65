/**
 * Account & Role Types
 *
 * An Account is an opaque identity token (an address or public key).
 * It carries no structure beyond equality; one value is reserved as
 * the "zero" sentinel meaning "nobody".
 *
 * Rules:
 * - Each account holds at most one non-"none" role at a time
 * - Role membership is append-only (no removal path)
 */

/**
 * Opaque account identity.
 */
export type Account = string;

/**
 * The reserved "zero / none" account. Never a valid candidate,
 * recipient or member.
 */
export const ZERO_ACCOUNT: Account = "0x0000000000000000000000000000000000000000";

/**
 * Membership roles. "none" is the implicit role of every unregistered account.
 */
export type Role = "none" | "board" | "teacher" | "student";

/** A role that can actually be granted. */
export type MemberRole = Exclude<Role, "none">;

export const MEMBER_ROLES: readonly MemberRole[] = ["board", "teacher", "student"];

/**
 * Amounts are non-negative integers in the smallest token unit.
 * No floating point anywhere in the organization's arithmetic.
 */
export type Amount = bigint;

/** Basis points: integer units of 1/10000. */
export type BasisPoints = number;

export const TOTAL_BASIS_POINTS = 10_000;

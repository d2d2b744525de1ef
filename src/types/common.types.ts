import type { DIAGNOSTIC_KIND, PROFILE, RELEASE_TYPE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents the semantic release type associated with a release.
 *
 * This type is derived from the `RELEASE_TYPE` constant object,
 * ensuring that only valid predefined release types can be used.
 *
 * @see {@link RELEASE_TYPE} for the available release type values
 */
export type ReleaseType = (typeof RELEASE_TYPE)[keyof typeof RELEASE_TYPE];

/**
 * Name of a keyword vocabulary accepted as commit message types.
 *
 * @see {@link PROFILE} for the available profiles
 */
export type Profile = (typeof PROFILE)[keyof typeof PROFILE];

/**
 * Kind of a parse diagnostic.
 *
 * @see {@link DIAGNOSTIC_KIND} for the available kinds
 */
export type DiagnosticKind = (typeof DIAGNOSTIC_KIND)[keyof typeof DIAGNOSTIC_KIND];

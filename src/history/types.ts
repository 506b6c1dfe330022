/**
 * @file History Type Definitions
 *
 * @module history
 */

/**
 * One immutable snapshot of an artifact. Only `tags` and `metrics` change
 * after creation, and only by replacing the record.
 *
 * @property sequence - 1-based, gapless within the artifact
 * @property fingerprint - Key of the content blob
 * @property variables - Template variable name to default value (null when none declared)
 * @property createdAt - ISO-8601 UTC timestamp
 */
export interface Version {
    readonly artifact: string;
    readonly sequence: number;
    readonly fingerprint: string;
    readonly variables: Readonly<Record<string, string | null>>;
    readonly author: string;
    readonly message: string;
    readonly createdAt: string;
    readonly tags: readonly string[];
    readonly metrics: Readonly<Record<string, number>>;
}

/** Extracts template variables from blob text. Derived metadata only. */
export type VariableExtractor = (content: string) => Record<string, string | null>;

/** Source of commit timestamps. */
export type Clock = () => Date;

/**
 * Configuration types for PRD Chat
 *
 * The configuration bounds what a single chat turn may write into the PRD
 * and how long an idle session is kept.
 */

/**
 * Configuration for a PRD Chat instance
 *
 * @remarks
 * Length limits are applied by the conversation driver, so they take part
 * in replay: changing them changes what a rebuilt session contains.
 *
 * @example
 * ```json
 * {
 *   "maxProjectNameLength": 100,
 *   "maxDescriptionLength": 1000,
 *   "maxMessageLength": 10000,
 *   "sessionTtlMinutes": 60
 * }
 * ```
 */
export interface Config {
  /**
   * Longest project name kept; longer names are clipped
   * @default 100
   */
  maxProjectNameLength: number;

  /**
   * Longest project description kept; longer descriptions are clipped
   * @default 1000
   */
  maxDescriptionLength: number;

  /**
   * Longest chat message accepted; longer messages are rejected
   * @default 10000
   */
  maxMessageLength: number;

  /**
   * Minutes of inactivity after which a session expires
   * @default 60
   */
  sessionTtlMinutes: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = {
  maxProjectNameLength: 100,
  maxDescriptionLength: 1000,
  maxMessageLength: 10000,
  sessionTtlMinutes: 60,
};

/**
 * Limits that shape what a message writes into the PRD
 *
 * @remarks
 * Recorded on each user message so a replay clips values the same way the
 * message was clipped when it was accepted.
 */
export type ClipLimits = Pick<Config, "maxProjectNameLength" | "maxDescriptionLength">;

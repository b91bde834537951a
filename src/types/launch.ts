/**
 * A JSON value as carried inside a launch context.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * SMART launch context.
 *
 * An ordered JSON object produced by the launching application (EHR or
 * launcher UI). The proxy never interprets the values, it only carries them
 * from the authorize leg to the token response. Well-known keys are
 * `patient`, `encounter`, `practitioner`, `need_patient_banner` and
 * `smart_style_url`; unknown keys pass through untouched.
 */
export type LaunchContext = { [key: string]: JsonValue };

/**
 * State carried through the identity provider in place of the client's own
 * `state` parameter.
 */
export interface CompoundState {
  /** Original client state, `null` when the client sent none */
  s: string | null;
  /** Base64url encoded JSON launch context, as received on the authorize leg */
  l: string;
}

/**
 * Authorization code handed to the client in place of the IdP's code:
 * the launch context with the real code merged in.
 */
export type CompoundCode = LaunchContext & { code: string };

import { errorKindOf } from "../adapters/errors.js";
import type { ErrorKind } from "../domain/types.js";

/** Result of one adapter call: a value, or the reason its section is degraded. */
export type Outcome<T> =
  | { status: "ok"; value: T }
  | { status: "degraded"; kind: ErrorKind; error: unknown };

/** Runs an adapter call and never rejects. */
export async function settle<T>(call: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { status: "ok", value: await call() };
  } catch (error) {
    return { status: "degraded", kind: errorKindOf(error), error };
  }
}

/**
 * Maps interpreted response outcomes onto the error taxonomy.
 */

import {
  CouchError,
  DocumentConflictError,
  DocumentNotFoundError,
  RequestFailedError,
} from "./errors.js";

export type Outcome =
  | { kind: "success"; status: number }
  | { kind: "not_found"; status: 404; reason: string }
  | { kind: "conflict"; status: 409; reason: string }
  | { kind: "failure"; status: number; reason: string; body: string };

export type FailureOutcome = Exclude<Outcome, { kind: "success" }>;

const SUCCESS_STATUSES = new Set([200, 201, 202]);

export class ErrorMapper {
  static isSuccess(status: number): boolean {
    return SUCCESS_STATUSES.has(status);
  }

  /**
   * Classifies a status code.
   *
   * Not-found and conflict outcomes carry the server's `reason` when the body
   * had one, otherwise the status text. Generic failures carry the status
   * text plus the full body text.
   */
  static classify(status: number, statusText: string, body: string, serverReason?: string): Outcome {
    if (this.isSuccess(status)) {
      return { kind: "success", status };
    }
    if (status === 404) {
      return { kind: "not_found", status, reason: serverReason ?? statusText };
    }
    if (status === 409) {
      return { kind: "conflict", status, reason: serverReason ?? statusText };
    }
    return { kind: "failure", status, reason: statusText, body };
  }

  static toError(outcome: FailureOutcome): CouchError {
    switch (outcome.kind) {
      case "not_found":
        return new DocumentNotFoundError(outcome.reason);
      case "conflict":
        return new DocumentConflictError(outcome.reason);
      case "failure":
        return new RequestFailedError(outcome.status, outcome.reason, outcome.body);
    }
  }
}

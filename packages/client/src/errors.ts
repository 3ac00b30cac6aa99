/**
 * failure of an external service the client depends on
 *
 * raised for unreachable endpoints, non-success statuses and payloads that
 * cannot be understood.
 */
export class ExternalError extends Error {
  /**
   * creates new external error
   * @param message error message describing the failure
   */
  constructor(message: string) {
    super(message);
    this.name = 'ExternalError';
  }
}

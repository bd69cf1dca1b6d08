/**
 * Unit-of-work boundary for service write paths. Everything awaited inside `run`
 * commits together or not at all; nested calls join the outer unit.
 */
export abstract class TransactionManager {
  abstract run<T>(fn: () => Promise<T>): Promise<T>;
}

export type CircuitPosition = "closed" | "open";

export interface CircuitSnapshot {
  state: CircuitPosition;
  failure_count: number;
  opened_until: string | null;
  last_failure_at: string | null;
}

export interface CircuitBreakerPort {
  isOpen(key: string): Promise<boolean> | boolean;
  recordSuccess(key: string): Promise<void> | void;
  recordFailure(key: string): Promise<void> | void;
  getState(key: string): Promise<CircuitSnapshot> | CircuitSnapshot;
  reset(key: string): Promise<void> | void;
}

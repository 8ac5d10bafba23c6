// @module: server-readiness
// @tags: health, lifecycle

export type ReadinessState = 'starting' | 'ready' | 'draining';

export interface ReadinessController {
  markReady(): void;
  markDraining(): void;
  isReady(): boolean;
  state(): ReadinessState;
}

export const createReadinessController = (): ReadinessController => {
  let current: ReadinessState = 'starting';

  return {
    markReady(): void {
      current = 'ready';
    },
    markDraining(): void {
      current = 'draining';
    },
    isReady(): boolean {
      return current === 'ready';
    },
    state(): ReadinessState {
      return current;
    },
  };
};

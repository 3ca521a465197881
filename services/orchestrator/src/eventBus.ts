import EventEmitter from 'eventemitter3';
import type { DispatchResult, StepOutcome } from './dispatcher';
import type { DispatchPlan } from './plan';

export type OrchestratorEvents = {
  step: (outcome: StepOutcome) => void;
  plan: (plan: DispatchPlan, result: DispatchResult) => void;
};

export class OrchestratorEventBus {
  private readonly emitter = new EventEmitter<OrchestratorEvents>();

  onStep(listener: (outcome: StepOutcome) => void): () => void {
    this.emitter.on('step', listener);
    return () => this.emitter.off('step', listener);
  }

  emitStep(outcome: StepOutcome): void {
    this.emitter.emit('step', outcome);
  }

  onPlan(listener: (plan: DispatchPlan, result: DispatchResult) => void): () => void {
    this.emitter.on('plan', listener);
    return () => this.emitter.off('plan', listener);
  }

  emitPlan(plan: DispatchPlan, result: DispatchResult): void {
    this.emitter.emit('plan', plan, result);
  }
}

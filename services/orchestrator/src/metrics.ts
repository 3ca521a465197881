import type { Counter, Gauge, Histogram } from '@venuepilot/metrics';
import { registerCounter, registerGauge, registerHistogram } from '@venuepilot/metrics';

export const commandsReceived: Counter<string> = registerCounter({
  name: 'orchestrator_commands_received_total',
  help: 'Chat commands received',
  labelNames: ['command']
});

export const commandsRejected: Counter<string> = registerCounter({
  name: 'orchestrator_commands_rejected_total',
  help: 'Chat commands rejected before or during execution',
  labelNames: ['command', 'code']
});

export const plansTotal: Counter<string> = registerCounter({
  name: 'orchestrator_plans_total',
  help: 'Dispatch plans executed by outcome',
  labelNames: ['command', 'outcome']
});

export const stepFailures: Counter<string> = registerCounter({
  name: 'orchestrator_step_failures_total',
  help: 'Plan steps that failed',
  labelNames: ['venue', 'action']
});

export const reconcilePolls: Counter<string> = registerCounter({
  name: 'orchestrator_reconcile_polls_total',
  help: 'Status polls issued while reconciling',
  labelNames: ['venue']
});

export const reconcileDuration: Histogram<string> = registerHistogram({
  name: 'orchestrator_reconcile_duration_seconds',
  help: 'Time spent waiting for a venue to reach the requested state',
  labelNames: ['venue', 'status'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120]
});

export const leaseHeld: Gauge<string> = registerGauge({
  name: 'orchestrator_venue_lease_held',
  help: '1 while a plan holds the venue lease',
  labelNames: ['venue']
});

export const armedGauge: Gauge<string> = registerGauge({
  name: 'orchestrator_armed',
  help: '1 while destructive commands are armed'
});

export const autoToggleSwitches: Counter<string> = registerCounter({
  name: 'orchestrator_auto_toggle_switches_total',
  help: 'Direction switches triggered by the auto toggle',
  labelNames: ['direction']
});

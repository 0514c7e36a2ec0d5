import type { TunerSettings } from '../config/perf-config.js';
import type { PerfController } from '../services/perf-controller.js';
import type { TelemetryStore } from '../storage/telemetry-store.js';
import type { ControllerState, WorkerPoolStatus } from '../types/index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  controller: ControllerState;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  telemetry: {
    mode: 'postgres' | 'memory';
    writeFailures: number;
    droppedWrites: number;
  };
  pool: WorkerPoolStatus;
  performance: {
    p95Ms: number;
    errorRate: number;
    throughputRps: number;
  } | null;
  errors: string[];
}

export interface HealthThresholds {
  memory: number;
  targetP95Ms: number;
  targetErrorRate: number;
}

export class HealthMonitor {
  private readonly startTime: number;
  private readonly thresholds: HealthThresholds;

  constructor(
    private readonly controller: PerfController,
    private readonly store: TelemetryStore,
    targets: Pick<TunerSettings, 'targetP95Ms' | 'targetErrorRate'>,
    memoryThreshold: number = 0.9
  ) {
    this.startTime = Date.now();
    this.thresholds = {
      memory: memoryThreshold,
      targetP95Ms: targets.targetP95Ms,
      targetErrorRate: targets.targetErrorRate,
    };
  }

  getHealthMetrics(): HealthMetrics {
    const memoryUsage = process.memoryUsage();
    const snapshot = this.controller.getSnapshot();
    const sample = snapshot.latestSample;
    const errors = this.collectProblems(memoryUsage, snapshot.state);

    return {
      status: this.determineHealthStatus(errors, snapshot.state),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      controller: snapshot.state,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryUsage.heapUsed / memoryUsage.heapTotal,
      },
      telemetry: {
        mode: this.store.mode,
        writeFailures: this.store.writeFailures,
        droppedWrites: this.store.droppedWrites,
      },
      pool: snapshot.pool,
      performance: sample
        ? { p95Ms: sample.p95Ms, errorRate: sample.errorRate, throughputRps: sample.throughputRps }
        : null,
      errors,
    };
  }

  /**
   * Ready while the controller is running with at least one executor.
   */
  isReady(): boolean {
    const snapshot = this.controller.getSnapshot();
    return snapshot.state === 'running' && snapshot.pool.active > 0;
  }

  private collectProblems(memoryUsage: NodeJS.MemoryUsage, state: ControllerState): string[] {
    const problems: string[] = [];
    const memoryPercentage = memoryUsage.heapUsed / memoryUsage.heapTotal;

    if (memoryPercentage > this.thresholds.memory) {
      problems.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }

    const sample = this.controller.getLatestSample();
    if (sample && sample.jobCount > 0) {
      if (sample.p95Ms > this.thresholds.targetP95Ms) {
        problems.push(`p95 latency ${sample.p95Ms}ms above target ${this.thresholds.targetP95Ms}ms`);
      }
      if (sample.errorRate > this.thresholds.targetErrorRate) {
        problems.push(
          `Error rate ${(sample.errorRate * 100).toFixed(1)}% above target ${(this.thresholds.targetErrorRate * 100).toFixed(1)}%`
        );
      }
    }

    if (this.store.mode === 'memory') {
      problems.push('Telemetry running in logging-only mode');
    }

    if (state !== 'running') {
      problems.push(`Controller is ${state}`);
    }

    return problems;
  }

  private determineHealthStatus(problems: string[], state: ControllerState): HealthStatus {
    if (state === 'stopped' || problems.length > 2) {
      return 'unhealthy';
    }
    return problems.length === 0 ? 'healthy' : 'degraded';
  }
}

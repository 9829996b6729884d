type CallbackResult = "ok" | "error";
type RemoteCallResult = "ok" | "transport_error" | "decode_error" | "remote_logic_error";
type StatusPushResult = "ok" | "error";

const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1_000, 2_500, 5_000, 10_000];

type CallbackKey = `${string}|${string}`;
type RemoteCallKey = `${string}|${string}`;
type ApiErrorKey = `${number}|${string}`;

type LatencyHistogram = {
  buckets: number[];
  count: number;
  sum: number;
};

function escapeLabel(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/"/g, '\\"');
}

export class MetricsService {
  private readonly callbackTotals = new Map<CallbackKey, number>();
  private readonly remoteCallTotals = new Map<RemoteCallKey, number>();
  private readonly remoteCallLatencies = new Map<string, LatencyHistogram>();
  private readonly apiErrors = new Map<ApiErrorKey, number>();
  private statusPushOk = 0;
  private statusPushError = 0;

  observeCallback(params: { callback: string; result: CallbackResult }): void {
    const key: CallbackKey = `${params.callback}|${params.result}`;
    this.callbackTotals.set(key, (this.callbackTotals.get(key) ?? 0) + 1);
  }

  observeRemoteCall(params: {
    operation: string;
    result: RemoteCallResult;
    latencyMs: number;
  }): void {
    const key: RemoteCallKey = `${params.operation}|${params.result}`;
    this.remoteCallTotals.set(key, (this.remoteCallTotals.get(key) ?? 0) + 1);

    const existing = this.remoteCallLatencies.get(params.operation) ?? {
      buckets: new Array<number>(LATENCY_BUCKETS_MS.length).fill(0),
      count: 0,
      sum: 0
    };
    const boundedLatency = Math.max(0, params.latencyMs);
    existing.count += 1;
    existing.sum += boundedLatency;
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      if (boundedLatency <= LATENCY_BUCKETS_MS[i]) {
        existing.buckets[i] += 1;
      }
    }
    this.remoteCallLatencies.set(params.operation, existing);
  }

  observeStatusPush(result: StatusPushResult): void {
    if (result === "ok") {
      this.statusPushOk += 1;
      return;
    }
    this.statusPushError += 1;
  }

  observeApiError(params: { statusCode: number; code: string }): void {
    const key: ApiErrorKey = `${params.statusCode}|${params.code}`;
    this.apiErrors.set(key, (this.apiErrors.get(key) ?? 0) + 1);
  }

  callbackTotal(callback: string, result: CallbackResult): number {
    return this.callbackTotals.get(`${callback}|${result}`) ?? 0;
  }

  remoteCallTotal(operation: string, result: RemoteCallResult): number {
    return this.remoteCallTotals.get(`${operation}|${result}`) ?? 0;
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push("# HELP device_adapter_callback_total Host callback outcomes by callback/result.");
    lines.push("# TYPE device_adapter_callback_total counter");
    for (const [key, value] of this.callbackTotals) {
      const [callback, result] = key.split("|");
      lines.push(
        `device_adapter_callback_total{callback="${escapeLabel(callback)}",result="${escapeLabel(result)}"} ${value}`
      );
    }

    lines.push("# HELP device_adapter_remote_call_total Remote platform call outcomes by operation/result.");
    lines.push("# TYPE device_adapter_remote_call_total counter");
    for (const [key, value] of this.remoteCallTotals) {
      const [operation, result] = key.split("|");
      lines.push(
        `device_adapter_remote_call_total{operation="${escapeLabel(operation)}",result="${escapeLabel(result)}"} ${value}`
      );
    }

    lines.push("# HELP device_adapter_remote_call_latency_ms Remote platform call latency histogram in milliseconds.");
    lines.push("# TYPE device_adapter_remote_call_latency_ms histogram");
    for (const [operation, histogram] of this.remoteCallLatencies) {
      const label = escapeLabel(operation);
      for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
        lines.push(
          `device_adapter_remote_call_latency_ms_bucket{operation="${label}",le="${LATENCY_BUCKETS_MS[i]}"} ${histogram.buckets[i]}`
        );
      }
      lines.push(`device_adapter_remote_call_latency_ms_bucket{operation="${label}",le="+Inf"} ${histogram.count}`);
      lines.push(`device_adapter_remote_call_latency_ms_sum{operation="${label}"} ${histogram.sum.toFixed(3)}`);
      lines.push(`device_adapter_remote_call_latency_ms_count{operation="${label}"} ${histogram.count}`);
    }

    lines.push("# HELP device_adapter_status_push_total Device status publish result counter.");
    lines.push("# TYPE device_adapter_status_push_total counter");
    lines.push(`device_adapter_status_push_total{result="ok"} ${this.statusPushOk}`);
    lines.push(`device_adapter_status_push_total{result="error"} ${this.statusPushError}`);

    lines.push("# HELP device_adapter_api_errors_total API error responses by status/code.");
    lines.push("# TYPE device_adapter_api_errors_total counter");
    for (const [key, value] of this.apiErrors) {
      const [statusCode, code] = key.split("|");
      lines.push(
        `device_adapter_api_errors_total{status_code="${escapeLabel(statusCode)}",code="${escapeLabel(code)}"} ${value}`
      );
    }

    return lines.join("\n");
  }
}

export const metricsService = new MetricsService();

/**
 * A span represents a unit of work or operation within a trace.
 * Spans track timing, attributes, and errors for observability.
 *
 * @example
 * ```typescript
 * const span = Telemetry.startSpan('layout-pass');
 * try {
 *   span.setAttribute('root', 'Counter');
 *   pass.resolve(root, widthSpec, heightSpec);
 * } catch (error) {
 *   span.recordError(error);
 *   throw error;
 * } finally {
 *   span.end();
 * }
 * ```
 */
export interface Span {
  /** End the span, recording its duration. */
  end(): void;
  /** Set an attribute on the span for filtering/analysis. */
  setAttribute(key: string, value: string | number | boolean): void;
  /** Record an error that occurred during this span. */
  recordError(error: unknown): void;
}

/**
 * Attributes for metrics, used for filtering and grouping.
 */
export interface MetricAttributes {
  [key: string]: string | number | boolean;
}

/**
 * A counter metric that only increases (e.g., passes started, cache hits).
 */
export interface Counter {
  add(value: number, attributes?: MetricAttributes): void;
}

/**
 * Interface for telemetry providers (e.g., OpenTelemetry).
 *
 * Implement this interface to integrate with your observability platform.
 */
export interface TelemetryProvider {
  /** Start a new span within the current trace. */
  startSpan(name: string): Span;
  /** Record an error in the current trace/span. */
  recordError(error: unknown): void;
  /** Get or create a counter metric. */
  getCounter(name: string, unit?: string, description?: string): Counter;
}

class NoOpProvider implements TelemetryProvider {
  startSpan(_name: string): Span {
    return {
      end: () => {},
      setAttribute: () => {},
      recordError: () => {},
    };
  }
  recordError(_error: unknown): void {}
  getCounter(_name: string): Counter {
    return { add: () => {} };
  }
}

/**
 * Global telemetry service for spans and metrics.
 *
 * By default, uses a no-op provider. Call `Telemetry.setProvider()` to integrate
 * with your observability platform.
 *
 * @see {@link TelemetryProvider} - Implement this to add a custom provider
 */
export class Telemetry {
  private static provider: TelemetryProvider = new NoOpProvider();

  static setProvider(provider: TelemetryProvider): void {
    this.provider = provider;
  }

  /**
   * Reset to the default no-op provider.
   */
  static resetProvider(): void {
    this.provider = new NoOpProvider();
  }

  static startSpan(name: string): Span {
    return this.provider.startSpan(name);
  }

  static recordError(error: unknown): void {
    this.provider.recordError(error);
  }

  /**
   * Get or create a counter metric.
   * @param name - Metric name (e.g., 'arbor.measure.cache_hit')
   */
  static getCounter(name: string, unit?: string, description?: string): Counter {
    return this.provider.getCounter(name, unit, description);
  }
}

/**
 * Signal Detection Types
 *
 * Facts collected by one pass of SignalVisitor over a single Ruby file.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'unknown';

export type MetricType = 'counter' | 'gauge' | 'histogram' | 'summary';

export type ModuleRelationKind = 'include' | 'prepend' | 'extend';

/**
 * Class or module definition found in a file
 */
export interface ClassStructure {
  /** Fully qualified name, e.g. `Services::Payments::StripeProcessor` */
  qualifiedName: string;
  /** Superclass as written; always null for modules */
  parentName: string | null;
  file: string;
  kind: 'class' | 'module';
}

/**
 * `include` / `prepend` / `extend` statement
 */
export interface ModuleRelation {
  moduleName: string;
  /** Qualified name of the class/module the statement appears in, `(top-level)` outside one */
  includingClass: string;
  kind: ModuleRelationKind;
  file: string;
}

export interface FileStructure {
  classes: ClassStructure[];
  relations: ModuleRelation[];
}

/**
 * Shape of the message argument of a log call
 */
export interface LogMessage {
  kind: 'string' | 'symbol' | 'interpolated' | 'other' | 'none';
  /** Source text of the argument */
  source: string;
  /** Literal fragments, in order (strings only) */
  staticParts: string[];
  /** One readable name per interpolated expression: `#{user.id}` → `user_id` */
  interpolationNames: string[];
}

export interface LogCall {
  level: LogLevel;
  /** Derived event name, null when the message has no usable literal text */
  eventName: string | null;
  /** True iff the message argument is an interpolated string */
  interpolated: boolean;
  /** Method as written (`info`, `add`, `log`) */
  method: string;
  message: LogMessage;
  definingClass: string;
  line: number;
}

export interface MetricCall {
  name: string;
  metricType: MetricType;
  receiver: string;
  definingClass: string;
  line: number;
}

/**
 * Metric-shaped call whose name is not a literal
 */
export interface DynamicMetricCall {
  receiver: string;
  metricType: MetricType;
  definingClass: string;
  file: string;
  line: number;
}

/**
 * Action method called on a constant that is not a known metric client,
 * e.g. `Metrics::RequestTotal.increment`. Resolved against registered
 * metric constants during collection.
 */
export interface ConstantMetricReference {
  constantName: string;
  /** Enclosing namespaces, innermost first; empty for `::Foo` references */
  lexicalScopes: string[];
  action: string;
  definingClass: string;
  line: number;
}

export interface VisitResult {
  filePath: string;
  structure: FileStructure;
  logCalls: LogCall[];
  metricCalls: MetricCall[];
  constantReferences: ConstantMetricReference[];
  dynamicMetricCalls: DynamicMetricCall[];
}

/**
 * Allow-lists driving detection
 */
export interface DetectionRules {
  /** Constants whose `.logger` is a logger: `Rails.logger.info` */
  logNamespaces: string[];
  /** Constant receivers used as loggers directly: `LOGGER.info` */
  constantLoggers: string[];
  /** Modules that give a class a bare `log(...)` method */
  loggingTraits: string[];
  /** Metric client constants: `StatsD.increment`, `Prometheus.counter(:x).increment` */
  metricReceivers: string[];
}

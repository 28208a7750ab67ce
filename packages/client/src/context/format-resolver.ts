/**
 * Format Resolution
 *
 * Resolves input format, output format and serde class names to known
 * implementations. Each execution context owns a resolver scope layered on a
 * parent, so formats registered for one client stay invisible to others.
 *
 * @packageDocumentation
 */

import { ClassResolutionError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export type FormatKind = 'input' | 'output' | 'serde';

/**
 * A resolved format implementation.
 */
export interface FormatClass {
  readonly name: string;
  readonly kind: FormatKind;
}

// =============================================================================
// Built-in Formats
// =============================================================================

const BUILTIN_FORMATS: ReadonlyArray<FormatClass> = [
  { name: 'org.apache.hadoop.mapred.TextInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.mapred.SequenceFileInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.hive.ql.io.RCFileInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.hive.ql.io.orc.OrcInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.hive.ql.io.parquet.MapredParquetInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.hive.ql.io.avro.AvroContainerInputFormat', kind: 'input' },
  { name: 'org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.ql.io.HiveSequenceFileOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.ql.io.RCFileOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.ql.io.orc.OrcOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.ql.io.parquet.MapredParquetOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.ql.io.avro.AvroContainerOutputFormat', kind: 'output' },
  { name: 'org.apache.hadoop.hive.serde2.lazy.LazySimpleSerDe', kind: 'serde' },
  { name: 'org.apache.hadoop.hive.serde2.columnar.ColumnarSerDe', kind: 'serde' },
  { name: 'org.apache.hadoop.hive.ql.io.orc.OrcSerde', kind: 'serde' },
  { name: 'org.apache.hadoop.hive.ql.io.parquet.serde.ParquetHiveSerDe', kind: 'serde' },
  { name: 'org.apache.hadoop.hive.serde2.avro.AvroSerDe', kind: 'serde' },
];

// =============================================================================
// Resolver
// =============================================================================

/**
 * A scope of known format implementations.
 *
 * @example
 * ```typescript
 * const scope = defaultFormatResolver().extend();
 * scope.register({ name: 'com.example.CsvInputFormat', kind: 'input' });
 * scope.resolve('com.example.CsvInputFormat', 'input');
 * ```
 */
export class FormatResolver {
  private readonly classes = new Map<string, FormatClass>();

  constructor(
    private readonly parent: FormatResolver | null = null,
    formats: Iterable<FormatClass> = []
  ) {
    for (const format of formats) {
      this.register(format);
    }
  }

  /**
   * Creates a child scope. Lookups fall back to this scope; registrations stay in the child.
   */
  extend(formats: Iterable<FormatClass> = []): FormatResolver {
    return new FormatResolver(this, formats);
  }

  register(format: FormatClass): void {
    this.classes.set(format.name, { name: format.name, kind: format.kind });
  }

  /**
   * Looks a class up without failing.
   */
  find(name: string): FormatClass | undefined {
    return this.classes.get(name) ?? this.parent?.find(name);
  }

  /**
   * Resolves a class name that must implement the given kind.
   *
   * @throws {ClassResolutionError} When the name is unknown or names another kind of class
   */
  resolve(name: string, kind: FormatKind): FormatClass {
    const found = this.find(name);
    if (!found) {
      throw new ClassResolutionError(name);
    }
    if (found.kind !== kind) {
      throw new ClassResolutionError(name, `${found.kind} class is not an ${kind} format`);
    }
    return found;
  }
}

let defaultResolver: FormatResolver | null = null;

/**
 * The process-wide root scope holding the built-in formats.
 */
export function defaultFormatResolver(): FormatResolver {
  if (!defaultResolver) {
    defaultResolver = new FormatResolver(null, BUILTIN_FORMATS);
  }
  return defaultResolver;
}

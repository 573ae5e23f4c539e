import { RecordAssembler } from './assembler.js';
import { EMPTY_DEREFERENCE_CONFIG } from './config.js';
import { Bf2MarcError, errorMessage } from './errors.js';
import { DescriptionExtractor, descriptionLabel } from './extractor.js';
import type { RdfFetcher } from './fetcher.js';
import { silentLogger, type Logger } from './logger.js';
import { loadQuery, type QueryPlan } from './query.js';
import { DereferenceResolver } from './resolver.js';
import type { GraphStore, GraphView } from './store.js';
import { Striper, type NamespaceTable } from './striper.js';
import { RecordTransformEngine } from './transformer.js';
import type {
  ConversionReport,
  ConversionResult,
  ConvertOptions,
  DereferenceConfig,
  Description,
  PipelineStage
} from './types.js';

const DEFAULT_PROGRESS_INTERVAL = 100;

export interface ConverterDependencies {
  plan: QueryPlan;
  engine: RecordTransformEngine;
  logger?: Logger;
  fetcher?: RdfFetcher;
  namespaces?: NamespaceTable;
}

/**
 * Runs every Work/Instance description of a graph through the pipeline and
 * collects the resulting records.
 */
export class Bf2MarcConverter {
  private readonly logger: Logger;
  private readonly dereference: DereferenceConfig;
  private readonly extractor: DescriptionExtractor;
  private readonly resolver: DereferenceResolver;
  private readonly striper: Striper;
  private readonly engine: RecordTransformEngine;
  private readonly assembler: RecordAssembler;

  constructor(private readonly options: ConvertOptions, dependencies: ConverterDependencies) {
    this.logger = dependencies.logger ?? silentLogger;
    this.dereference = options.dereference ?? EMPTY_DEREFERENCE_CONFIG;
    this.extractor = new DescriptionExtractor(dependencies.plan, this.logger);
    this.resolver = new DereferenceResolver({
      timeout: options.dereferenceTimeout,
      fetcher: dependencies.fetcher,
      logger: this.logger
    });
    this.striper = new Striper(dependencies.namespaces);
    this.engine = dependencies.engine;
    this.assembler = new RecordAssembler(this.logger);
  }

  /**
   * Load the description query and the mapping rules named in the options
   * (or the bundled ones) and build a converter around them.
   */
  static async create(
    options: ConvertOptions = {},
    dependencies: Omit<ConverterDependencies, 'plan' | 'engine'> = {}
  ): Promise<Bf2MarcConverter> {
    const [plan, engine] = await Promise.all([
      loadQuery(options.queryFile),
      RecordTransformEngine.fromFile(options.rulesFile)
    ]);
    return new Bf2MarcConverter(options, { ...dependencies, plan, engine });
  }

  /**
   * Convert every description in the store. The store is frozen first.
   * Only extraction errors escape; anything failing inside one description
   * is reported in its result and the run goes on.
   */
  async convert(store: GraphStore): Promise<ConversionReport> {
    const startTime = Date.now();
    store.freeze();

    const descriptions = this.extractor.extract(store);
    const interval = this.options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;

    const results: ConversionResult[] = [];
    for (const [index, description] of descriptions.entries()) {
      results.push(await this.convertDescription(description));
      if ((index + 1) % interval === 0) {
        this.logger.info(`Processed ${index + 1} of ${descriptions.length} descriptions...`);
      }
    }

    const report: ConversionReport = {
      results,
      collection: {
        records: results.flatMap(result => (result.status === 'converted' ? [result.record] : [])),
        warnings: results.flatMap(result => (result.status === 'failed' ? [failureMessage(result.description, result.stage, result.error)] : []))
      },
      descriptions: descriptions.length,
      converted: results.filter(result => result.status === 'converted').length,
      empty: results.filter(result => result.status === 'empty').length,
      failed: results.filter(result => result.status === 'failed').length,
      processingTime: Date.now() - startTime
    };

    this.logger.info(
      `Converted ${report.converted} of ${report.descriptions} descriptions in ${report.processingTime}ms` +
      ` (${report.empty} without a record, ${report.failed} failed)`
    );

    return report;
  }

  private async convertDescription(description: Description): Promise<ConversionResult> {
    let stage: PipelineStage = 'dereference';
    try {
      const view = await this.resolver.resolve(description, this.dereference);
      const graph: GraphView = view.graph;

      stage = 'stripe';
      const striped = this.striper.stripe(description, graph);

      stage = 'transform';
      const document = await this.engine.transform(striped);
      if (document === null) {
        this.logger.debug(`${descriptionLabel(description)}: no record`);
        return { status: 'empty', description };
      }

      stage = 'assemble';
      const record = await this.assembler.buildRecord(document);
      this.assembler.checkWritable(record, this.options.outputFormat ?? 'marcxml');
      return { status: 'converted', description, record };
    } catch (error) {
      const failure = error instanceof Error ? error : new Bf2MarcError(errorMessage(error), 'description');
      this.logger.warn(failureMessage(description, stage, failure));
      return { status: 'failed', description, stage, error: failure };
    }
  }
}

function failureMessage(description: Description, stage: PipelineStage, error: Error): string {
  return `${descriptionLabel(description)}: ${stage} failed: ${error.message}`;
}

/**
 * 2 when descriptions were found, none converted and at least one failed;
 * 0 otherwise.
 */
export function exitCodeFor(report: ConversionReport): number {
  return report.descriptions > 0 && report.converted === 0 && report.failed > 0 ? 2 : 0;
}

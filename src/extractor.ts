import type * as RDF from '@rdfjs/types';
import { QueryError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { evaluateQuery, type Binding, type QueryPlan } from './query.js';
import { GraphStore, isResource, termKey, typesOf, type GraphView } from './store.js';
import type { Description, ResourceTerm } from './types.js';

/**
 * Finds the Work/Instance pairs of a graph and cuts out the subgraph that
 * belongs to each of them.
 */
export class DescriptionExtractor {
  constructor(
    private readonly plan: QueryPlan,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * One description per distinct (Work, Instance) pair, in the order the pairs
   * were first found. A solution lacking either node, or binding a literal,
   * is not a description.
   */
  extract(graph: GraphView): Description[] {
    let solutions: Binding[];
    try {
      solutions = evaluateQuery(this.plan, graph);
    } catch (error) {
      if (error instanceof QueryError) {
        throw error;
      }
      throw new QueryError(`Failed to run description query: ${errorMessage(error)}`, { cause: error });
    }

    const descriptions: Description[] = [];
    const seen = new Set<string>();

    for (const solution of solutions) {
      const work = solution.get(this.plan.workVariable);
      const instance = solution.get(this.plan.instanceVariable);
      if (!work || !instance || !isResource(work) || !isResource(instance)) {
        continue;
      }

      const key = `${termKey(work)} ${termKey(instance)}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      descriptions.push({
        work,
        instance,
        workTypes: typesOf(graph, work),
        instanceTypes: typesOf(graph, instance),
        graph: this.closure(graph, [work, instance]).freeze()
      });
    }

    if (descriptions.length === 0) {
      this.logger.info('No Work/Instance descriptions found');
    } else {
      this.logger.info(`Found ${descriptions.length} description(s)`);
    }

    return descriptions;
  }

  /**
   * Triples reachable from the roots, following object links breadth-first
   * for at most `closureDepth` hops.
   */
  private closure(graph: GraphView, roots: ResourceTerm[]): GraphStore {
    const subgraph = new GraphStore();
    const visited = new Set<string>(roots.map(termKey));
    let frontier: RDF.Term[] = roots;

    for (let depth = 0; depth < this.plan.closureDepth && frontier.length > 0; depth++) {
      const next: RDF.Term[] = [];
      for (const node of frontier) {
        for (const triple of graph.match(node, null, null)) {
          subgraph.add(triple);
          const object = triple.object;
          if (isResource(object) && !visited.has(termKey(object))) {
            visited.add(termKey(object));
            next.push(object);
          }
        }
      }
      frontier = next;
    }

    return subgraph;
  }
}

export function descriptionLabel(description: Description): string {
  return `Work ${description.work.value} / Instance ${description.instance.value}`;
}

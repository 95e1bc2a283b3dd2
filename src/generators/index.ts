import type { CorpusConfig } from '../types/index.js';
import type { GeneratorSet } from './types.js';
import { QueryGenerator } from './query-generator.js';
import { EvidenceSynthesisGenerator, type TableSource } from './synthesis-generator.js';
import { LabelGenerator, type SnippetSegmenter } from './label-generator.js';

export type { GeneratorInput, PerPaperGenerator, BatchGenerator, ArtifactGenerator, GeneratorSet } from './types.js';
export { QueryGenerator } from './query-generator.js';
export { EvidenceSynthesisGenerator, pmcTableSource, type TableSource } from './synthesis-generator.js';
export { LabelGenerator, pmcFullTextSegmenter, type SnippetSegmenter } from './label-generator.js';

/**
 * Build the default generator for every stage from configuration.
 */
export function createGenerators(
    config: Pick<CorpusConfig, 'generatorVersion' | 'query' | 'label'>,
    options: { segmenter?: SnippetSegmenter; tables?: TableSource } = {}
): GeneratorSet {
    return {
        query: new QueryGenerator(config.generatorVersion, config.query),
        synthesis: new EvidenceSynthesisGenerator(config.generatorVersion, options.tables),
        label: new LabelGenerator(config.generatorVersion, config.label, options.segmenter),
    };
}

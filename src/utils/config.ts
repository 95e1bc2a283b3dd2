import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type CorpusConfig } from '../types/index.js';
import { getLogger } from './logger.js';

export type CorpusConfigOverrides = Partial<Omit<CorpusConfig, 'query' | 'label' | 'synthesis'>> & {
    query?: Partial<CorpusConfig['query']>;
    label?: Partial<CorpusConfig['label']>;
    synthesis?: Partial<CorpusConfig['synthesis']>;
};

/**
 * Load configuration from hecorpus.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<CorpusConfigOverrides | null> {
    const explorer = cosmiconfig('hecorpus', {
        searchPlaces: ['hecorpus.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return toOverrides(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the keys of a parsed config file whose value has the expected primitive type.
 */
function pickTyped<T extends object>(source: unknown, template: T): Partial<T> {
    const picked: Partial<T> = {};
    if (!isRecord(source)) return picked;

    for (const key of Object.keys(template) as Array<keyof T & string>) {
        const value = source[key];
        if (value !== undefined && typeof value === typeof template[key]) {
            Object.assign(picked, { [key]: value });
        }
    }
    return picked;
}

function toOverrides(raw: unknown): CorpusConfigOverrides {
    if (!isRecord(raw)) return {};
    const { query, label, synthesis, ...top } = DEFAULT_CONFIG;
    return {
        ...pickTyped(raw, top),
        query: pickTyped(raw['query'], query),
        label: pickTyped(raw['label'], label),
        synthesis: pickTyped(raw['synthesis'], synthesis),
    };
}

/**
 * Drop keys whose value is undefined so they do not mask lower-precedence values.
 */
function defined<T extends object>(value: T | undefined): Partial<T> {
    const result: Partial<T> = {};
    if (!value) return result;
    for (const key of Object.keys(value) as Array<keyof T>) {
        if (value[key] !== undefined) result[key] = value[key];
    }
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: CorpusConfigOverrides,
    searchFrom?: string
): Promise<CorpusConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const { query: cliQuery, label: cliLabel, synthesis: cliSynthesis, ...cliTop } = cliFlags;

    return {
        ...DEFAULT_CONFIG,
        ...defined(fileConfig ?? undefined),
        ...defined(cliTop),
        // Deep merge nested objects
        query: {
            ...DEFAULT_CONFIG.query,
            ...defined(fileConfig?.query),
            ...defined(cliQuery),
        },
        label: {
            ...DEFAULT_CONFIG.label,
            ...defined(fileConfig?.label),
            ...defined(cliLabel),
        },
        synthesis: {
            ...DEFAULT_CONFIG.synthesis,
            ...defined(fileConfig?.synthesis),
            ...defined(cliSynthesis),
        },
    };
}

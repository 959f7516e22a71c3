import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';

const languageCode = z.string().regex(/^[a-z]{2}$/);

const patternSchema = z.object({
    name: z.string().min(1),
    regex: z.string().min(1),
    score: z.number().min(0).max(1),
});

const recognizerSchema = z.object({
    name: z.string().min(1),
    entity_type: z.string().min(1),
    patterns: z.array(patternSchema).min(1),
    languages: z.array(languageCode).min(1).default(['en']),
    context: z.array(z.string()).default([]),
    enabled: z.boolean().default(true),
});

const recognizerConfigSchema = z.object({
    supported_languages: z.array(languageCode).min(1),
    context_boost: z.number().min(0).max(1).default(0.35),
    recognizers: z.array(recognizerSchema),
});

export type RecognizerConfig = z.infer<typeof recognizerConfigSchema>;

/** Compiled form of one pattern. Regexes are global and case-insensitive. */
export interface CompiledPattern {
    name: string;
    regex: RegExp;
    score: number;
}

export interface CompiledRecognizer {
    name: string;
    entityType: string;
    patterns: CompiledPattern[];
    languages: Set<string>;
    context: Set<string>;
}

export function parseRecognizerConfig(raw: unknown): RecognizerConfig {
    const result = recognizerConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(`Invalid recognizer configuration: ${result.error.message}`);
    }
    return result.data;
}

export async function loadRecognizerConfig(file: string): Promise<RecognizerConfig> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(file, 'utf8'));
    } catch (err) {
        throw new ConfigurationError(`Cannot read recognizer configuration ${file}: ${errorMessage(err)}`);
    }
    return parseRecognizerConfig(raw);
}

export function compileRecognizers(config: RecognizerConfig): CompiledRecognizer[] {
    return config.recognizers
        .filter(r => r.enabled)
        .map(r => ({
            name: r.name,
            entityType: r.entity_type,
            patterns: r.patterns.map(p => {
                try {
                    return { name: p.name, regex: new RegExp(p.regex, 'gi'), score: p.score };
                } catch (err) {
                    throw new ConfigurationError(`Recognizer ${r.name}/${p.name}: ${errorMessage(err)}`);
                }
            }),
            languages: new Set(r.languages),
            context: new Set(r.context.map(w => w.toLowerCase())),
        }));
}

import { HttpError } from '../errors';
import { componentLogger } from '../logger';
import { AnalyzerResult, TextAnalyzer } from './types';
import {
    CompiledRecognizer,
    compileRecognizers,
    loadRecognizerConfig,
    RecognizerConfig,
} from './recognizers';

// =================================================================
// PATTERN ANALYZER
// =================================================================
//
// Regex recognizers, one entity type each, loaded from
// config/recognizers.json.
//
//   1. Run every recognizer that supports the language
//   2. A context word anywhere in the text ("email", "phone", …)
//      raises the score by contextBoost, capped at 1
//   3. Drop results under minScore
//   4. Overlaps: highest score wins, then earliest start
//
//   "call me at 555-123-4567"  PHONE_NUMBER 0.4 + 0.35 = 0.75 ✓
//   "ref 555-123-4567"         PHONE_NUMBER 0.4           < 0.5 ✗
// =================================================================

const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

export interface PatternAnalyzerOptions {
    minScore?: number;
}

export class PatternAnalyzer implements TextAnalyzer {
    private recognizers: CompiledRecognizer[];
    private languages: string[];
    private contextBoost: number;
    private minScore: number;
    private log = componentLogger('analyzer');

    constructor(config: RecognizerConfig, options: PatternAnalyzerOptions = {}) {
        this.recognizers = compileRecognizers(config);
        this.languages = [...config.supported_languages];
        this.contextBoost = config.context_boost;
        this.minScore = options.minScore ?? 0.5;

        this.log.info(
            { recognizers: this.recognizers.map(r => r.name), languages: this.languages },
            'pattern analyzer ready'
        );
    }

    static async fromFile(file: string, options: PatternAnalyzerOptions = {}): Promise<PatternAnalyzer> {
        return new PatternAnalyzer(await loadRecognizerConfig(file), options);
    }

    supportedLanguages(): string[] {
        return [...this.languages];
    }

    async analyze(text: string, language: string): Promise<AnalyzerResult[]> {
        if (!this.languages.includes(language)) {
            throw new HttpError(400, `Unsupported language: ${language}`);
        }

        const words = new Set(text.toLowerCase().split(WORD_SPLIT).filter(w => w.length > 0));
        const candidates: AnalyzerResult[] = [];

        for (const recognizer of this.recognizers) {
            if (!recognizer.languages.has(language)) continue;

            const boosted = [...recognizer.context].some(w => words.has(w));

            for (const pattern of recognizer.patterns) {
                for (const match of text.matchAll(pattern.regex)) {
                    if (match.index === undefined || match[0].length === 0) continue;

                    const score = boosted
                        ? Math.min(1, round2(pattern.score + this.contextBoost))
                        : pattern.score;

                    if (score < this.minScore) continue;

                    candidates.push({
                        entityType: recognizer.entityType,
                        start: match.index,
                        end: match.index + match[0].length,
                        score,
                    });
                }
            }
        }

        return resolveOverlaps(candidates);
    }
}

function resolveOverlaps(candidates: AnalyzerResult[]): AnalyzerResult[] {
    const ranked = [...candidates].sort((a, b) => b.score - a.score || a.start - b.start);
    const kept: AnalyzerResult[] = [];

    for (const candidate of ranked) {
        const overlaps = kept.some(k => candidate.start < k.end && k.start < candidate.end);
        if (!overlaps) kept.push(candidate);
    }

    return kept.sort((a, b) => a.start - b.start);
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

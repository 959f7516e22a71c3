// =================================================================
// Text Analyzer Interface
// =================================================================
// The PII detection engine the HTTP routes call into. Offsets are
// character positions into the analyzed text, end exclusive.
// =================================================================

export interface AnalyzerResult {
    entityType: string;
    start: number;
    end: number;
    score: number; // 0..1
}

export interface TextAnalyzer {
    analyze(text: string, language: string): Promise<AnalyzerResult[]>;

    supportedLanguages(): string[];
}

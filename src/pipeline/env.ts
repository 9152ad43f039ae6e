import * as dotenv from 'dotenv';
dotenv.config();

export type AssemblyMode = 'chunked' | 'flat';
export type StyledEngine = 'weasyprint' | 'prince';

function assemblyModeOf(v: string | undefined): AssemblyMode {
    return v === 'chunked' ? 'chunked' : 'flat';
}

function styledEngineOf(v: string | undefined): StyledEngine {
    return v === 'prince' ? 'prince' : 'weasyprint';
}

export const ENV = {
    youtubeApiKey: process.env.YOUTUBE_API_KEY || '',
    geminiApiKey: process.env.GEMINI_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.5-pro',
    // Gemini's OpenAI-compatible endpoint; the openai SDK talks to it directly
    geminiBaseUrl:
        process.env.GEMINI_BASE_URL ||
        'https://generativelanguage.googleapis.com/v1beta/openai/',
    rewriteRetries: Number(process.env.REWRITE_RETRIES || 3),
    // Pause after each transcript fetch to stay under YouTube's rate limits
    fetchDelayMs: Number(process.env.FETCH_DELAY_MS || 1000),
    transcriptLanguage: process.env.TRANSCRIPT_LANGUAGE || 'en',
    assemblyMode: assemblyModeOf(process.env.ASSEMBLY_MODE),
    // Optional: directory holding DejaVuSans.ttf / DejaVuSans-Bold.ttf for the basic PDF
    pdfFontDir: process.env.PDF_FONT_DIR || '',
    styledEngine: styledEngineOf(process.env.STYLED_ENGINE),
    // Optional: override the HTML-to-PDF binary name/path
    styledEngineBin: process.env.STYLED_ENGINE_BIN || '',
};

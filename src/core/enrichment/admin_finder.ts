import OpenAI from 'openai';

import { Logger } from '../../utils/logger';
import { SearchSnippet, SnippetSearch } from './snippet_search';

/** Answers that mean "no name found"; compared case-insensitively. */
export const NOT_FOUND_PHRASES = [
    'nessun amministratore',
    'non ho trovato',
    'non è possibile',
    'non trovato',
    'non disponibile',
    'non riesco',
    'non sono in grado',
    'non presente',
];

const SYSTEM_PROMPT = 'Sei un assistente esperto nell\'estrazione di nomi di persone da testi. Segui ESATTAMENTE le istruzioni fornite.';

const USER_PROMPT = `Analizza i seguenti risultati di ricerca ed estrai SOLO il nome completo dell'amministratore, amministratore delegato, CEO, fondatore o titolare dell'azienda.

REGOLE:
1. Rispondi SOLO con il nome completo (es: "Mario Rossi"), senza titoli o spiegazioni
2. Se trovi più persone, scegli la figura di maggior rilievo (amministratore > CEO > fondatore > titolare)
3. Se NON trovi alcun nome, rispondi ESATTAMENTE: "Nessun amministratore trovato"

TESTO DA ANALIZZARE:
`;

export interface CompletionClient {
    complete(system: string, user: string): Promise<string>;
}

export interface OpenAICompletionOptions {
    apiKey: string;
    baseURL: string;
    model: string;
    timeoutMs?: number;
}

/** OpenAI-compatible chat endpoint (DeepSeek by default). */
export class OpenAICompletionClient implements CompletionClient {
    private readonly client: OpenAI;

    constructor(private readonly options: OpenAICompletionOptions) {
        this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, timeout: options.timeoutMs ?? 30000 });
    }

    async complete(system: string, user: string): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.options.model,
            messages: [
                { role: 'system', content: system },
                { role: 'user', content: user },
            ],
            temperature: 0.1,
            max_tokens: 100,
            top_p: 0.95,
        });
        if (response.usage) {
            Logger.debug(`[AdminOracle] tokens prompt=${response.usage.prompt_tokens} completion=${response.usage.completion_tokens}`);
        }
        return response.choices[0]?.message?.content ?? '';
    }
}

/**
 * Text → person name. `null` means the model found nobody, or answered
 * with something that is not a 2-5 word name.
 */
export class AdminNameOracle {
    constructor(private readonly client: CompletionClient) {}

    async findName(payload: string): Promise<string | null> {
        if (!payload.trim()) return null;

        const answer = (await this.client.complete(SYSTEM_PROMPT, `${USER_PROMPT}${payload}\n\nRISPOSTA (solo il nome):`))
            .trim()
            .replace(/^["'«]+|["'».]+$/g, '')
            .trim();
        return AdminNameOracle.interpret(answer);
    }

    static interpret(answer: string): string | null {
        const lower = answer.toLowerCase();
        if (!answer || NOT_FOUND_PHRASES.some((p) => lower.includes(p))) return null;
        const words = answer.split(/\s+/);
        if (words.length < 2 || words.length > 5) return null;
        return answer;
    }
}

export type AdminLookupStatus = 'ok' | 'not_found' | 'error';

export interface AdminLookup {
    status: AdminLookupStatus;
    name: string;
}

/** Snippet search followed by the oracle. */
export class AdminFinder {
    constructor(private readonly search: SnippetSearch, private readonly oracle: AdminNameOracle) {}

    async lookup(companyName: string, comune = ''): Promise<AdminLookup> {
        const query = `${companyName} ${comune} amministratore`.replace(/\s+/g, ' ').trim();
        try {
            const snippets = await this.search.search(query);
            if (snippets.length === 0) return { status: 'not_found', name: '' };

            const name = await this.oracle.findName(AdminFinder.buildPayload(companyName, query, snippets));
            return name ? { status: 'ok', name } : { status: 'not_found', name: '' };
        } catch (e) {
            Logger.logError('[AdminFinder] lookup failed', e, { company_name: companyName });
            return { status: 'error', name: '' };
        }
    }

    static buildPayload(companyName: string, query: string, snippets: SearchSnippet[]): string {
        const lines = [`AZIENDA: ${companyName}`, `QUERY: ${query}`, '', 'RISULTATI (DuckDuckGo):'];
        snippets.forEach((s, i) => {
            lines.push(`[${i + 1}] TITOLO: ${s.title}`, `SNIPPET: ${s.snippet}`, `URL: ${s.url}`, '');
        });
        return lines.join('\n').trim();
    }
}

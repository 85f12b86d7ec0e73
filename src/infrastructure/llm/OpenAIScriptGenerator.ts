import axios from 'axios';
import { IScriptGenerator, ScriptRequest } from '../../domain/ports/IScriptGenerator';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { ScriptArtifact, createScriptArtifact } from '../../domain/entities/ScriptArtifact';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { providerErrorFromHttp } from '../http/ProviderHttpError';
import { SCRIPT_SYSTEM_PROMPT, buildScriptPrompt } from './ScriptPrompts';

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

interface GeneratedScript {
    script: string;
    searchTerms: string[];
    title?: string;
    hashtags: string[];
}

function toStringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Generates narration scripts with OpenAI chat completions in JSON mode.
 */
export class OpenAIScriptGenerator implements IScriptGenerator {
    readonly name = 'openai-script';

    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;

    constructor(apiKey: string, model: string = 'gpt-4o-mini', baseUrl: string = 'https://api.openai.com') {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl;
    }

    async produce(request: ScriptRequest, context: AdapterContext): Promise<ScriptArtifact> {
        const topic = request.prompt.trim();
        if (!topic) {
            throw new ProviderError(this.name, 'invalid_prompt', 'Prompt is required for script generation');
        }

        console.log(`[${context.jobId}] [Script] Generating script (attempt ${context.attempt}) for: "${topic.substring(0, 60)}"`);

        let content: string;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: SCRIPT_SYSTEM_PROMPT },
                        { role: 'user', content: buildScriptPrompt(topic, request.targetDurationSeconds, request.maxSearchTerms) },
                    ],
                    temperature: 0.8,
                    response_format: { type: 'json_object' },
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    signal: context.signal,
                    timeout: 60000,
                }
            );
            content = response.data.choices?.[0]?.message?.content ?? '';
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'invalid_prompt');
        }

        const generated = this.parseResponse(content);
        return createScriptArtifact({
            rawText: generated.script,
            searchTerms: generated.searchTerms.slice(0, request.maxSearchTerms),
            title: generated.title,
            hashtags: generated.hashtags,
        });
    }

    /**
     * Parses the JSON reply, tolerating markdown code fences.
     */
    parseResponse(content: string): GeneratedScript {
        let parsed: unknown;
        try {
            parsed = JSON.parse(content.replace(/```json\n?|\n?```/g, '').trim());
        } catch {
            throw new ProviderError(this.name, 'provider_unavailable', `Failed to parse script response as JSON: ${content.substring(0, 200)}`);
        }

        if (typeof parsed !== 'object' || parsed === null || !('script' in parsed) || typeof parsed.script !== 'string' || !parsed.script.trim()) {
            throw new ProviderError(this.name, 'content_policy', 'Script response did not contain any narration');
        }

        return {
            script: parsed.script,
            searchTerms: 'searchTerms' in parsed ? toStringList(parsed.searchTerms) : [],
            title: 'title' in parsed && typeof parsed.title === 'string' ? parsed.title : undefined,
            hashtags: 'hashtags' in parsed ? toStringList(parsed.hashtags) : [],
        };
    }
}

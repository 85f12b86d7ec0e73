import { ScriptArtifact } from '../entities/ScriptArtifact';
import { IStageAdapter } from './IStageAdapter';

export interface ScriptRequest {
    prompt: string;
    targetDurationSeconds: number;
    /** Upper bound for the suggested footage search terms */
    maxSearchTerms: number;
}

/**
 * IScriptGenerator - Port for narration script generation.
 * Fails with ProviderError{rate_limited, invalid_prompt, provider_unavailable}.
 * Implementations: OpenAIScriptGenerator
 */
export type IScriptGenerator = IStageAdapter<ScriptRequest, ScriptArtifact>;

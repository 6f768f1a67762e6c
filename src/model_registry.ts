// model_registry.ts - known code models and their provider capabilities
import type { Provider } from './config';

export interface ModelInfo {
    id: string;
    provider: Provider;
    contextWindow: number;
    supportsJsonMode: boolean;
}

export class ModelRegistry {
    private static instance: ModelRegistry;
    private models: Map<string, ModelInfo> = new Map();

    private constructor() {
        this.initializeDefaults();
    }

    public static getInstance(): ModelRegistry {
        if (!ModelRegistry.instance) {
            ModelRegistry.instance = new ModelRegistry();
        }
        return ModelRegistry.instance;
    }

    private initializeDefaults() {
        const defaults: ModelInfo[] = [
            {
                id: 'qwen2.5-coder:14b',
                provider: 'ollama',
                contextWindow: 32768,
                supportsJsonMode: true
            },
            {
                id: 'qwen2.5-coder:7b',
                provider: 'ollama',
                contextWindow: 32768,
                supportsJsonMode: true
            },
            {
                id: 'deepseek-coder-v2:16b',
                provider: 'ollama',
                contextWindow: 65536,
                supportsJsonMode: true
            },
            {
                id: 'codellama:13b',
                provider: 'ollama',
                contextWindow: 16384,
                supportsJsonMode: false
            },
            {
                id: 'deepseek/deepseek-chat',
                provider: 'openrouter',
                contextWindow: 64000,
                supportsJsonMode: true
            },
            {
                id: 'qwen/qwen-2.5-coder-32b-instruct',
                provider: 'openrouter',
                contextWindow: 32768,
                supportsJsonMode: true
            },
            {
                id: 'anthropic/claude-3.5-sonnet',
                provider: 'openrouter',
                contextWindow: 200000,
                supportsJsonMode: false  // Anthropic models don't support response_format: json_object
            },
            {
                id: 'openai/gpt-4o',
                provider: 'openrouter',
                contextWindow: 128000,
                supportsJsonMode: true
            },
            {
                id: 'openai/gpt-4o-mini',
                provider: 'openrouter',
                contextWindow: 128000,
                supportsJsonMode: true
            }
        ];

        defaults.forEach(m => this.models.set(m.id, m));
    }

    public getModelInfo(modelId: string): ModelInfo | undefined {
        return this.models.get(modelId);
    }

    public registerModel(info: ModelInfo) {
        this.models.set(info.id, info);
    }
}

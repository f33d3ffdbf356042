import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { DEFAULT_MODEL } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { TOOLS } from "./tools.js";

export type Role = "system" | "user" | "assistant";

export type Message = {
    role: Role;
    content: string;
};

export type ChatOptions = {
    model?: string;
    systemPrompt?: string | null;
    useTools?: boolean;
};

export type ToolCall = {
    id: string;
    name: string;
    // Raw JSON string as produced by the model; never parsed or executed here.
    arguments: string;
};

/**
 * The slice of the OpenAI client the invoker talks to. The real `OpenAI`
 * instance satisfies it; tests pass an in-process fake.
 */
export interface CompletionsClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export type ChatInvokerOptions = {
    client: CompletionsClient;
    defaultModel?: string;
    logger?: Logger;
};

export function buildMessages(prompt: string, systemPrompt?: string | null): Message[] {
    const messages: Message[] = [];

    if (systemPrompt != null) {
        messages.push({ role: "system", content: systemPrompt });
    }

    messages.push({ role: "user", content: prompt });
    return messages;
}

function toChatMessage(message: Message): ChatCompletionMessageParam {
    switch (message.role) {
        case "system":
            return { role: "system", content: message.content };
        case "user":
            return { role: "user", content: message.content };
        case "assistant":
            return { role: "assistant", content: message.content };
    }
}

export function replyText(response: ChatCompletion): string {
    return response.choices[0]?.message.content ?? "";
}

export function toolCallsOf(response: ChatCompletion): ToolCall[] {
    const calls = response.choices[0]?.message.tool_calls ?? [];
    return calls.map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
    }));
}

export class ChatInvoker {
    private client: CompletionsClient;
    readonly defaultModel: string;
    private logger: Logger;

    constructor(options: ChatInvokerOptions) {
        this.client = options.client;
        this.defaultModel = options.defaultModel ?? DEFAULT_MODEL;
        this.logger = options.logger ?? createLogger("silent");
    }

    buildRequest(prompt: string, options: ChatOptions = {}): ChatCompletionCreateParamsNonStreaming {
        const request: ChatCompletionCreateParamsNonStreaming = {
            model: options.model ?? this.defaultModel,
            messages: buildMessages(prompt, options.systemPrompt).map(toChatMessage),
        };

        if (options.useTools) {
            request.tools = TOOLS;
        }

        return request;
    }

    /** One blocking chat call; the raw response is returned and errors propagate. */
    async invoke(prompt: string, options: ChatOptions = {}): Promise<ChatCompletion> {
        const request = this.buildRequest(prompt, options);
        this.logger.debug(
            `chat model=${request.model} messages=${request.messages.length} tools=${request.tools?.length ?? 0}`
        );

        const started = Date.now();
        const response = await this.client.chat.completions.create(request);
        this.logger.debug(
            `chat done in ${Date.now() - started}ms finish=${response.choices[0]?.finish_reason ?? "none"}`
        );
        return response;
    }

    async invokeText(prompt: string, options: ChatOptions = {}): Promise<string> {
        return replyText(await this.invoke(prompt, options));
    }
}

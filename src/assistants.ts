import type { ChatCompletion } from "openai/resources/chat/completions";
import type { ChatInvoker } from "./chat.js";
import { parseRefundAnalysis, type RefundAnalysis } from "./schemas/refundAnalysis.js";

export type AssistantPreset = {
    systemPrompt: string;
    useTools: boolean;
};

export const ASSISTANTS = {
    greeting: {
        systemPrompt: "You are a friendly assistant. Respond warmly to greetings.",
        useTools: false,
    },
    weather: {
        systemPrompt: "You are a weather assistant. You can get the weather for a given city.",
        useTools: true,
    },
    customerService: {
        systemPrompt:
            "You are a helpful customer service agent for an online store.\n" +
            "You can help with:\n" +
            "- Order inquiries\n" +
            "- Refund requests\n" +
            "- Product questions\n" +
            "- General support\n" +
            "\n" +
            "Be polite, concise, and helpful. Do not answer questions that are not related to the store.\n" +
            "Use the available tools when appropriate.",
        useTools: true,
    },
    refund: {
        systemPrompt:
            "You are a refund processing assistant.\n" +
            "When a customer requests a refund, use the process_refund tool to handle it.",
        useTools: true,
    },
    purchase: {
        systemPrompt:
            "You are a purchase assistant.\n" +
            "When a customer wants to buy something, use the create_purchase tool to handle it.",
        useTools: true,
    },
} satisfies Record<string, AssistantPreset>;

export type AssistantName = keyof typeof ASSISTANTS;

export const ASSISTANT_NAMES = Object.keys(ASSISTANTS).filter(isAssistantName);

export function isAssistantName(value: string): value is AssistantName {
    return Object.prototype.hasOwnProperty.call(ASSISTANTS, value);
}

export function runAssistant(invoker: ChatInvoker, name: AssistantName, message: string): Promise<ChatCompletion> {
    const preset: AssistantPreset = ASSISTANTS[name];
    return invoker.invoke(message, { systemPrompt: preset.systemPrompt, useTools: preset.useTools });
}

export function greetingAssistant(invoker: ChatInvoker, message: string) {
    return runAssistant(invoker, "greeting", message);
}

export function weatherAssistant(invoker: ChatInvoker, message: string) {
    return runAssistant(invoker, "weather", message);
}

export function customerServiceAgent(invoker: ChatInvoker, message: string) {
    return runAssistant(invoker, "customerService", message);
}

export function refundHandler(invoker: ChatInvoker, message: string) {
    return runAssistant(invoker, "refund", message);
}

export function purchaseHandler(invoker: ChatInvoker, message: string) {
    return runAssistant(invoker, "purchase", message);
}

export const REFUND_ANALYSIS_SYSTEM_PROMPT =
    "You are a refund analysis assistant. Reply with a single JSON object and nothing else.";

export function refundAnalysisPrompt(orderId: string, reason: string): string {
    return (
        `Analyze this refund request for order ${orderId}.\n` +
        `Customer reason: ${reason}\n\n` +
        "Respond with a JSON object with the keys " +
        '"orderId" (string), "decision" ("approve", "deny" or "needs_review") and "summary" (string).'
    );
}

/** Raw model text, returned as-is. */
export function analyzeRefund(invoker: ChatInvoker, orderId: string, reason: string): Promise<string> {
    return invoker.invokeText(refundAnalysisPrompt(orderId, reason), {
        systemPrompt: REFUND_ANALYSIS_SYSTEM_PROMPT,
    });
}

export async function analyzeRefundStructured(
    invoker: ChatInvoker,
    orderId: string,
    reason: string
): Promise<RefundAnalysis> {
    return parseRefundAnalysis(await analyzeRefund(invoker, orderId, reason));
}

import "dotenv/config";
import type { ChatCompletion } from "openai/resources/chat/completions";
import {
    analyzeRefund,
    customerServiceAgent,
    greetingAssistant,
    purchaseHandler,
    refundHandler,
    weatherAssistant,
} from "./assistants.js";
import { ChatInvoker, replyText, toolCallsOf } from "./chat.js";
import { createClient, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";

function describeResponse(response: ChatCompletion): string {
    const lines = [`Response: ${replyText(response)}`];
    for (const call of toolCallsOf(response)) {
        lines.push(`Tool call: ${call.name}(${call.arguments})`);
    }
    return lines.join("\n");
}

async function main() {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const invoker = new ChatInvoker({ client: createClient(config), defaultModel: config.model, logger });

    const demos: [string, () => Promise<ChatCompletion>][] = [
        ["greeting assistant", () => greetingAssistant(invoker, "Hello!")],
        [
            "greeting assistant 2",
            () =>
                greetingAssistant(
                    invoker,
                    "What is 2+2? Just give me the number. No emojis, no fluff. Just the number."
                ),
        ],
        ["greeting assistant 3", () => greetingAssistant(invoker, "Hi there!")],
        ["weather assistant", () => weatherAssistant(invoker, "What's the weather in Tokyo?")],
        ["customer service agent", () => customerServiceAgent(invoker, "What's the capital of France?")],
        ["refund handler", () => refundHandler(invoker, "I want to return order #12345, it arrived damaged")],
        ["purchase handler", () => purchaseHandler(invoker, "I'd like to buy product ABC123, quantity 2")],
    ];

    for (const [label, run] of demos) {
        console.log(`Testing ${label}...`);
        console.log(`${describeResponse(await run())}\n`);
    }

    console.log("Testing refund analysis...");
    const analysis = await analyzeRefund(invoker, "12345", "The package arrived damaged");
    console.log(`Response: ${analysis}`);
}

main().catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
});

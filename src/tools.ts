import type { ChatCompletionTool } from "openai/resources/chat/completions";

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object") {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

// Advertised to the model only; nothing in this project executes them.
// Frozen all the way down: requests hand out this same array.
export const TOOLS: ChatCompletionTool[] = deepFreeze<ChatCompletionTool[]>([
    {
        type: "function",
        function: {
            name: "get_weather",
            description: "Get the weather for a given city",
            parameters: {
                type: "object",
                properties: {
                    city: {
                        type: "string",
                        description: "The city to get the weather for",
                    },
                },
                required: ["city"],
            },
        },
    },
    {
        type: "function",
        function: {
            name: "process_refund",
            description: "Process a refund for a customer order",
            parameters: {
                type: "object",
                properties: {
                    order_id: {
                        type: "string",
                        description: "The order ID to refund",
                    },
                    reason: {
                        type: "string",
                        description: "Reason for the refund",
                    },
                },
                required: ["order_id", "reason"],
            },
        },
    },
    {
        type: "function",
        function: {
            name: "create_purchase",
            description: "Create a new purchase order for a customer",
            parameters: {
                type: "object",
                properties: {
                    product_id: {
                        type: "string",
                        description: "The product ID to purchase",
                    },
                    quantity: {
                        type: "integer",
                        description: "Quantity to purchase",
                    },
                },
                required: ["product_id", "quantity"],
            },
        },
    },
]);

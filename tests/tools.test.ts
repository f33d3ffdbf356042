import { describe, expect, it } from "vitest";
import { TOOLS } from "../src/tools.js";

function tool(name: string) {
    const found = TOOLS.find((t) => t.function.name === name);
    if (!found) throw new Error(`missing tool ${name}`);
    return found;
}

describe("TOOLS", () => {
    it("advertises three function tools in order", () => {
        expect(TOOLS).toHaveLength(3);
        expect(TOOLS.map((t) => t.type)).toEqual(["function", "function", "function"]);
        expect(TOOLS.map((t) => t.function.name)).toEqual(["get_weather", "process_refund", "create_purchase"]);
    });

    it("get_weather takes a required city string", () => {
        expect(tool("get_weather").function).toEqual({
            name: "get_weather",
            description: "Get the weather for a given city",
            parameters: {
                type: "object",
                properties: {
                    city: { type: "string", description: "The city to get the weather for" },
                },
                required: ["city"],
            },
        });
    });

    it("process_refund requires order_id and reason", () => {
        expect(tool("process_refund").function).toEqual({
            name: "process_refund",
            description: "Process a refund for a customer order",
            parameters: {
                type: "object",
                properties: {
                    order_id: { type: "string", description: "The order ID to refund" },
                    reason: { type: "string", description: "Reason for the refund" },
                },
                required: ["order_id", "reason"],
            },
        });
    });

    it("create_purchase takes an integer quantity", () => {
        expect(tool("create_purchase").function).toEqual({
            name: "create_purchase",
            description: "Create a new purchase order for a customer",
            parameters: {
                type: "object",
                properties: {
                    product_id: { type: "string", description: "The product ID to purchase" },
                    quantity: { type: "integer", description: "Quantity to purchase" },
                },
                required: ["product_id", "quantity"],
            },
        });
    });

    it("cannot be changed at any depth", () => {
        const purchase = tool("create_purchase");
        expect(Object.isFrozen(TOOLS)).toBe(true);
        expect(Object.isFrozen(purchase)).toBe(true);
        expect(Object.isFrozen(purchase.function)).toBe(true);
        expect(Object.isFrozen(purchase.function.parameters)).toBe(true);
        expect(() => TOOLS.push(purchase)).toThrow(TypeError);
        expect(() => {
            purchase.function.name = "delete_everything";
        }).toThrow(TypeError);
        expect(purchase.function.name).toBe("create_purchase");
    });
});

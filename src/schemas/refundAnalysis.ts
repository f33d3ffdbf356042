import { z } from "zod";
import { RefundAnalysisError } from "../errors.js";

export const RefundDecisionSchema = z.enum(["approve", "deny", "needs_review"]);

export const RefundAnalysisSchema = z.object({
    orderId: z.string(),
    decision: RefundDecisionSchema,
    summary: z.string(),
});

export type RefundAnalysis = z.infer<typeof RefundAnalysisSchema>;

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;
const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

export function parseRefundAnalysis(text: string): RefundAnalysis {
    let body = text.replace(THINK_BLOCK, "").trim();
    const fenced = CODE_FENCE.exec(body);
    if (fenced) {
        body = fenced[1];
    }

    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch {
        throw new RefundAnalysisError("Model reply is not valid JSON", text);
    }

    const parsed = RefundAnalysisSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new RefundAnalysisError(`Model reply does not match the refund analysis shape: ${issues}`, text);
    }

    return parsed.data;
}

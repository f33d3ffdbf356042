export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

/** The model's reply could not be read as a refund analysis object. */
export class RefundAnalysisError extends Error {
    readonly raw: string;

    constructor(message: string, raw: string) {
        super(message);
        this.name = "RefundAnalysisError";
        this.raw = raw;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export type ExposedHttpError = {
    status: number;
    type?: string;
    message: string;
};

/**
 * Errors raised by express.json() carry `status`, `expose` and a `type` such
 * as "entity.parse.failed" or "entity.too.large". Anything without an exposed
 * 4xx/5xx status is not one of them.
 */
export function exposedHttpError(err: unknown): ExposedHttpError | null {
    if (!(err instanceof Error)) return null;
    const status = "status" in err ? err.status : undefined;
    const expose = "expose" in err ? err.expose : undefined;
    const type = "type" in err ? err.type : undefined;
    if (typeof status !== "number" || status < 400 || expose !== true) return null;

    return {
        status,
        type: typeof type === "string" ? type : undefined,
        message: err.message,
    };
}

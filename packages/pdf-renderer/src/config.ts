import { join, parse as parsePath } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_MARGIN_PIXELS = 50;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const renderConfigSchema = z.object({
    marginPixels: z.number().int().nonnegative().default(DEFAULT_MARGIN_PIXELS),
    outputPath: z.string().min(1),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    browserPath: z.string().min(1).optional(),
});

export type RenderConfig = Readonly<z.infer<typeof renderConfigSchema>>;
export type RenderConfigInput = z.input<typeof renderConfigSchema>;

export function createRenderConfig(input: RenderConfigInput): RenderConfig {
    const parsed = renderConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        );
    }
    return Object.freeze(parsed.data);
}

/**
 * notes/readme.md => notes/readme.pdf
 */
export function defaultOutputPath(inputPath: string): string {
    const { dir, name } = parsePath(inputPath);
    return join(dir, `${name}.pdf`);
}

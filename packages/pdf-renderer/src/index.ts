export { assemble } from "./assemble";
export type { AssembledDocument, AssembleOptions } from "./assemble";
export {
    createRenderConfig,
    defaultOutputPath,
    renderConfigSchema,
    DEFAULT_MARGIN_PIXELS,
    DEFAULT_TIMEOUT_MS,
} from "./config";
export type { RenderConfig, RenderConfigInput } from "./config";
export { convertMarkdownToPdf, markdownToDocument } from "./convert";
export type { ConversionResult, ConvertOptions } from "./convert";
export {
    CapabilityUnavailableError,
    ConfigError,
    RenderAbortedError,
    RenderError,
    TimeoutError,
    errorMessage,
} from "./errors";
export { RenderOrchestrator } from "./orchestrator";
export type {
    OrchestratorOptions,
    PdfArtifact,
    RendererCapability,
    RendererSession,
    RenderState,
} from "./orchestrator";
export { PuppeteerCapability, resolveBrowserExecutable, BROWSER_ENV_VARS } from "./puppeteer";
export type { PuppeteerCapabilityOptions, ResolveBrowserOptions } from "./puppeteer";
export { DOCUMENT_CSS_TEMPLATE, MARGIN_PLACEHOLDER, renderStylesheet } from "./template";

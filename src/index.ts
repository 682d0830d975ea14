/**
 * pushover-mcp: Public API
 *
 * Pushover notifications exposed as MCP tools: send, send urgent,
 * validate credentials, check message limits, health.
 */

// Client
export { PushoverClient, PUSHOVER_API_BASE, REQUEST_TIMEOUT_MS } from './PushoverClient.js';
export type { PushoverClientOptions } from './PushoverClient.js';
export { ClientProvider, MISSING_CREDENTIALS_MESSAGE } from './ClientProvider.js';
export type { ClientProviderOptions } from './ClientProvider.js';
export { ConfigurationError } from './ConfigurationError.js';

// Types
export type {
    Credentials,
    Priority,
    EmergencyPolicy,
    SendOptions,
    SendResult,
    ValidationResult,
    LimitsResult,
    McpToolDef,
    McpCallResult,
} from './types.js';

// Configuration
export {
    resolveCredentials,
    mergeCredentials,
    isValidCredentials,
    environmentSource,
    fileSource,
    defaultSources,
    getConfigFilePath,
    TOKEN_ENV,
    USER_KEY_ENV,
} from './ConfigResolver.js';
export type { CredentialSource } from './ConfigResolver.js';

// Pure functions
export {
    buildMessagePayload,
    buildValidatePayload,
    truncate,
    DEFAULT_EMERGENCY_POLICY,
    MAX_MESSAGE_LENGTH,
    MAX_TITLE_LENGTH,
    MAX_URL_LENGTH,
    MAX_URL_TITLE_LENGTH,
} from './PayloadBuilder.js';
export { parseSendResult, parseValidationResult, parseLimitsResult } from './ResponseParser.js';
export { SOUNDS, URGENT_SOUND, isSound } from './Sounds.js';
export type { Sound } from './Sounds.js';

// Tools
export { PushoverTools, isPriority, usagePercent, PRIORITY_RANGE_ERROR } from './PushoverTools.js';
export type {
    ToolRecord,
    SendRecord,
    ValidateRecord,
    LimitsRecord,
    HealthRecord,
} from './PushoverTools.js';
export { TOOL_DEFINITIONS, TOOL_NAMES } from './ToolCatalog.js';
export type { ToolName, SendArgs, SendUrgentArgs } from './ToolCatalog.js';
export { ToolRouter, toCallResult, isFailureRecord } from './ToolRouter.js';

// Infrastructure
export { createServer, SERVER_INFO } from './ServerFactory.js';
export { serveStdio, serveSse } from './Transport.js';
export type { SseOptions } from './Transport.js';
export { logger, createLogger } from './Logger.js';

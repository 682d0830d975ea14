/**
 * PushoverTools: Tool-Facing Operations
 *
 * Maps tool invocations onto PushoverClient calls and shapes the results
 * into plain snake_case records. API rejections come back as records with
 * `success: false` / `valid: false`, never as exceptions.
 *
 * Configuration errors and transport failures still throw from here
 * (except in `health()`); ToolRouter turns them into error records.
 */
import { isValidCredentials } from './ConfigResolver.js';
import type { ClientProvider } from './ClientProvider.js';
import { URGENT_SOUND, isSound } from './Sounds.js';
import type { SendArgs, SendUrgentArgs } from './ToolCatalog.js';
import type { Priority, SendResult } from './types.js';

// ── Result Records ──────────────────────────────────────────────────

export type ErrorRecord = { success: false; error: string };

export type SendRecord =
    | { success: true; message: string; request_id: string }
    | { success: false; errors: readonly string[]; request_id: string }
    | ErrorRecord;

export type ValidateRecord =
    | { valid: true; devices: readonly string[]; licenses: readonly string[] }
    | { valid: false; errors: readonly string[] };

export type LimitsRecord = {
    limit: number;
    remaining: number;
    reset_timestamp: number;
    usage_percent: number;
};

export type HealthRecord =
    | { status: 'healthy'; credentials_valid: true; devices: readonly string[] }
    | { status: 'unhealthy'; credentials_valid: false; errors: readonly string[] }
    | { status: 'unhealthy'; error: string }
    | { status: 'error'; error: string };

export type ToolRecord = SendRecord | ValidateRecord | LimitsRecord | HealthRecord;

export const PRIORITY_RANGE_ERROR = 'Priority must be between -2 and 2';

// ── Helpers ─────────────────────────────────────────────────────────

export function isPriority(value: number): value is Priority {
    return Number.isInteger(value) && value >= -2 && value <= 2;
}

/** Share of the monthly allowance already used, one decimal place. */
export function usagePercent(limit: number, remaining: number): number {
    const used = (1 - remaining / Math.max(limit, 1)) * 100;
    return Math.round(used * 10) / 10;
}

function toSendRecord(result: SendResult, successMessage: string): SendRecord {
    if (result.success) {
        return { success: true, message: successMessage, request_id: result.requestId };
    }
    return { success: false, errors: result.errors, request_id: result.requestId };
}

// ── PushoverTools ───────────────────────────────────────────────────

export class PushoverTools {
    private readonly provider: ClientProvider;

    constructor(provider: ClientProvider) {
        this.provider = provider;
    }

    /** Priority is range-checked here, before the client is touched. */
    async send(args: SendArgs): Promise<SendRecord> {
        const { priority } = args;
        if (!isPriority(priority)) {
            return { success: false, error: PRIORITY_RANGE_ERROR };
        }

        const result = await this.provider.get().sendMessage({
            message: args.message,
            title: args.title,
            priority,
            sound: args.sound,
            device: args.device,
            url: args.url,
            urlTitle: args.url_title,
            html: args.html,
            ttl: args.ttl,
            timestamp: args.timestamp,
        });

        return toSendRecord(result, 'Notification sent successfully');
    }

    /** Priority 1; an unknown sound falls back to `siren`. */
    async sendUrgent(args: SendUrgentArgs): Promise<SendRecord> {
        const result = await this.provider.get().sendMessage({
            message: args.message,
            title: args.title,
            priority: 1,
            sound: isSound(args.sound) ? args.sound : URGENT_SOUND,
        });

        return toSendRecord(result, 'Urgent notification sent successfully');
    }

    async validate(): Promise<ValidateRecord> {
        const result = await this.provider.get().validateUser();

        if (result.valid) {
            return { valid: true, devices: result.devices, licenses: result.licenses };
        }
        return { valid: false, errors: result.errors };
    }

    async limits(): Promise<LimitsRecord> {
        const result = await this.provider.get().getLimits();

        return {
            limit: result.limit,
            remaining: result.remaining,
            reset_timestamp: result.reset,
            usage_percent: usagePercent(result.limit, result.remaining),
        };
    }

    /** Never throws: every failure is reported in the record. */
    async health(): Promise<HealthRecord> {
        try {
            if (!isValidCredentials(this.provider.credentials())) {
                return { status: 'unhealthy', error: 'Credentials not configured' };
            }

            const result = await this.provider.get().validateUser();
            if (result.valid) {
                return { status: 'healthy', credentials_valid: true, devices: result.devices };
            }
            return { status: 'unhealthy', credentials_valid: false, errors: result.errors };
        } catch (err) {
            return { status: 'error', error: err instanceof Error ? err.message : String(err) };
        }
    }
}

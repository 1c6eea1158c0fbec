import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { HubSettings } from './config.js';
import type { Log } from './instance-logger.js';
import { BUTTON_ACTIONS } from './scheduler/types.js';
import type {
    ButtonAction,
    Capability,
    DeviceActions,
    HubEnvironment,
    HubVariable,
    SwitchState,
    Unsubscribe,
    VariableStore,
} from './scheduler/types.js';

const idSchema = z.union([z.string(), z.number()]).transform(String);

const deviceRecordSchema = z.object({
    id: idSchema,
    name: z.string().default(''),
    label: z.string().nullable().optional(),
    capabilities: z.array(z.unknown()).default([]),
    attributes: z.union([z.record(z.unknown()), z.array(z.unknown())]).default({}),
});

const modeSchema = z.object({
    id: idSchema,
    name: z.string(),
    active: z.boolean().default(false),
});

const variableSchema = z.object({
    name: z.string(),
    type: z.string().default(''),
    value: z.union([z.string(), z.number(), z.null()]).transform((value) => (value === null ? '' : String(value))),
});

const attributeEntrySchema = z.object({
    name: z.string(),
    currentValue: z.unknown(),
});

export interface HubDeviceRecord {
    id: string;
    label: string;
    capabilities: string[];
    attributes: Record<string, unknown>;
}

const BUTTON_CAPABILITIES: Record<ButtonAction, string> = {
    push: 'PushableButton',
    hold: 'HoldableButton',
    doubleTap: 'DoubleTapableButton',
    release: 'ReleasableButton',
};

function toDeviceRecord(raw: z.infer<typeof deviceRecordSchema>): HubDeviceRecord {
    const attributes: Record<string, unknown> = {};
    if (Array.isArray(raw.attributes)) {
        raw.attributes.forEach((entry) => {
            const parsed = attributeEntrySchema.safeParse(entry);
            if (parsed.success) {
                attributes[parsed.data.name] = parsed.data.currentValue;
            }
        });
    } else {
        Object.assign(attributes, raw.attributes);
    }

    return {
        id: raw.id,
        label: raw.label || raw.name || raw.id,
        capabilities: raw.capabilities.filter((capability): capability is string => typeof capability === 'string'),
        attributes,
    };
}

/**
 * One hub device as seen by the scheduler
 */
export class HubDevice implements DeviceActions {
    constructor(
        private readonly hub: HubApi,
        readonly id: string,
    ) {}

    private get record(): HubDeviceRecord | undefined {
        return this.hub.deviceRecord(this.id);
    }

    get label(): string {
        return this.record?.label ?? this.id;
    }

    turnOn(): Promise<void> {
        return this.hub.sendCommand(this.id, 'on');
    }

    turnOff(): Promise<void> {
        return this.hub.sendCommand(this.id, 'off');
    }

    setLevel(level: number): Promise<void> {
        return this.hub.sendCommand(this.id, 'setLevel', Math.min(100, Math.max(0, Math.round(level))));
    }

    invoke(action: ButtonAction, buttonNumber: number): Promise<void> {
        return this.hub.sendCommand(this.id, action, buttonNumber);
    }

    currentState(): SwitchState | null {
        const value = this.record?.attributes.switch;
        return value === 'on' || value === 'off' ? value : null;
    }

    currentLevel(): number | null {
        const level = Number(this.record?.attributes.level);
        return Number.isFinite(level) ? level : null;
    }

    supportedCapabilities(): readonly Capability[] {
        const capabilities = this.record?.capabilities ?? [];
        const supported: Capability[] = [];
        if (capabilities.includes('Switch')) {
            supported.push('Switch');
        }
        if (capabilities.includes('SwitchLevel')) {
            supported.push('Dimmer');
        }
        if (this.supportedButtonActions().length > 0) {
            supported.push('Button');
        }
        return supported;
    }

    supportedButtonActions(): readonly ButtonAction[] {
        const capabilities = this.record?.capabilities ?? [];
        return BUTTON_ACTIONS.filter((action) =>
            capabilities.includes(BUTTON_CAPABILITIES[action]),
        );
    }
}

/**
 * Per-instance view of the hub variables. In-use marks are tracked per view so
 * one instance clearing its marks leaves the others alone.
 */
class ScopedVariables implements VariableStore {
    readonly inUse = new Set<string>();

    constructor(private readonly hub: HubApi) {}

    get(name: string): { value: string } | null {
        return this.hub.get(name);
    }

    list(): HubVariable[] {
        return this.hub.list();
    }

    onChange(name: string, handler: (value: string) => void): Unsubscribe {
        return this.hub.onChange(name, handler);
    }

    onRename(handler: (oldName: string, newName: string) => void): Unsubscribe {
        return this.hub.onRename(handler);
    }

    markInUse(name: string): void {
        this.inUse.add(name);
    }

    clearAllInUse(): void {
        this.inUse.clear();
    }
}

/**
 * Client for the hub's Maker API: device commands, device/mode/variable polling
 */
export class HubApi implements HubEnvironment {
    private readonly http: AxiosInstance;
    private requestQueue: Promise<unknown> = Promise.resolve();
    private pollTimer: NodeJS.Timeout | null = null;

    private devices = new Map<string, HubDeviceRecord>();
    private variables = new Map<string, HubVariable>();
    private activeMode: string | null = null;
    private variablesLoaded = false;

    private changeHandlers = new Map<string, Set<(value: string) => void>>();
    private renameHandlers = new Set<(oldName: string, newName: string) => void>();
    private scopes = new Set<ScopedVariables>();

    constructor(
        private readonly settings: HubSettings,
        private readonly log: Log,
        http?: AxiosInstance,
    ) {
        this.http = http ?? axios.create({
            baseURL: `${settings.baseUrl.replace(/\/+$/, '')}/apps/api/${settings.appId}`,
            timeout: settings.timeoutMs,
            params: { access_token: settings.accessToken },
            headers: { Accept: 'application/json' },
        });
    }

    /**
     * Refresh devices, the active mode and hub variables. A failed request keeps
     * the previous values.
     */
    async poll(): Promise<void> {
        const devices = await this.fetchList('/devices/all', deviceRecordSchema);
        if (devices) {
            this.devices = new Map(devices.map((raw) => {
                const record = toDeviceRecord(raw);
                return [record.id, record];
            }));
        }

        const modes = await this.fetchList('/modes', modeSchema);
        if (modes) {
            this.activeMode = modes.find((mode) => mode.active)?.name ?? null;
        }

        const variables = await this.fetchList('/hubvariables', variableSchema);
        if (variables) {
            this.applyVariables(variables);
        }
    }

    startPolling(): void {
        this.stopPolling();
        this.pollTimer = setInterval(() => {
            this.poll().catch((error) => this.log.error(`[API] Error polling hub: ${error}`));
        }, this.settings.pollSeconds * 1000);
    }

    stopPolling(): void {
        if (this.pollTimer) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }
    }

    /**
     * Send a device command; failures are logged and rethrown to the caller
     */
    async sendCommand(deviceId: string, command: string, value?: number): Promise<void> {
        const path = `/devices/${encodeURIComponent(deviceId)}/${command}${value === undefined ? '' : `/${value}`}`;
        try {
            await this.queueRequest(async () => {
                this.log.debug(`[API] Sending GET request to ${path}`);
                const response = await this.http.get(path);
                this.log.debug(`[API] GET ${path} - Status: ${response.status}`);
            });
        } catch (error) {
            this.handleApiError(`sendCommand(${deviceId}, ${command})`, error);
            throw error;
        }
    }

    deviceRecord(deviceId: string): HubDeviceRecord | undefined {
        return this.devices.get(deviceId);
    }

    device(deviceId: string): HubDevice | undefined {
        return this.devices.has(deviceId) ? new HubDevice(this, deviceId) : undefined;
    }

    deviceList(): HubDevice[] {
        return [...this.devices.keys()].map((deviceId) => new HubDevice(this, deviceId));
    }

    // HubEnvironment

    currentMode(): string | null {
        return this.activeMode;
    }

    switchState(deviceId: string): SwitchState | null {
        return this.device(deviceId)?.currentState() ?? null;
    }

    now(): Date {
        return new Date();
    }

    // Hub variables

    get(name: string): { value: string } | null {
        const variable = this.variables.get(name);
        return variable ? { value: variable.value } : null;
    }

    list(): HubVariable[] {
        return [...this.variables.values()];
    }

    onChange(name: string, handler: (value: string) => void): Unsubscribe {
        const handlers = this.changeHandlers.get(name) ?? new Set();
        handlers.add(handler);
        this.changeHandlers.set(name, handlers);
        return () => {
            handlers.delete(handler);
            if (handlers.size === 0 && this.changeHandlers.get(name) === handlers) {
                this.changeHandlers.delete(name);
            }
        };
    }

    onRename(handler: (oldName: string, newName: string) => void): Unsubscribe {
        this.renameHandlers.add(handler);
        return () => {
            this.renameHandlers.delete(handler);
        };
    }

    /**
     * Variable view for one scheduler instance
     */
    scoped(): VariableStore {
        const scope = new ScopedVariables(this);
        this.scopes.add(scope);
        return scope;
    }

    inUseNames(): Set<string> {
        const names = new Set<string>();
        this.scopes.forEach((scope) => scope.inUse.forEach((name) => names.add(name)));
        return names;
    }

    private applyVariables(next: HubVariable[]): void {
        const previous = this.variables;
        this.variables = new Map(next.map((variable) => [variable.name, variable]));

        if (!this.variablesLoaded) {
            this.variablesLoaded = true;
            return;
        }

        // An in-use variable that vanished while exactly one new variable with its value appeared was renamed
        const renames: Array<[string, string]> = [];
        this.inUseNames().forEach((name) => {
            const old = previous.get(name);
            if (!old || this.variables.has(name)) {
                return;
            }
            const added = next.filter((variable) => !previous.has(variable.name) && variable.value === old.value);
            if (added.length === 1) {
                renames.push([name, added[0].name]);
            }
        });

        const changed: Array<[(value: string) => void, string]> = [];
        this.changeHandlers.forEach((handlers, name) => {
            const after = this.variables.get(name)?.value;
            if (after !== undefined && previous.get(name)?.value !== after) {
                this.log.debug(`[API] Hub variable changed: ${name} -> ${after}`);
                handlers.forEach((handler) => changed.push([handler, after]));
            }
        });

        renames.forEach(([oldName, newName]) => {
            this.log.info(`[API] Hub variable renamed: ${oldName} -> ${newName}`);
            [...this.renameHandlers].forEach((handler) => handler(oldName, newName));
        });
        changed.forEach(([handler, value]) => handler(value));
    }

    private async fetchList<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>[] | null> {
        try {
            return await this.queueRequest(async () => {
                const response = await this.http.get(path);
                this.log.debug(`[API] GET ${path} - Status: ${response.status}`);

                const parsed = z.array(schema).safeParse(response.data);
                if (!parsed.success) {
                    this.log.error(`[API] Unexpected response from ${path}: ${parsed.error.issues[0]?.message}`);
                    return null;
                }
                return parsed.data;
            });
        } catch (error) {
            this.handleApiError(`GET ${path}`, error);
            return null;
        }
    }

    /**
     * Run requests one at a time. The queue moves on after a failed request;
     * the caller still receives the failure.
     */
    private queueRequest<T>(requestFn: () => Promise<T>): Promise<T> {
        const result = this.requestQueue.then(requestFn, requestFn);
        this.requestQueue = result.catch(() => undefined);
        return result;
    }

    /**
     * Standardized error handling for API calls
     */
    private handleApiError(method: string, error: unknown): void {
        if (axios.isAxiosError(error)) {
            if (error.response) {
                // Server responded with error status
                this.log.error(
                    `[API] Error in ${method}: Status ${error.response.status} - ` +
                    `${JSON.stringify(error.response.data)}`,
                );

                if (error.response.status === 401) {
                    this.log.error('[API] Authentication failed. Please check your access token.');
                } else if (error.response.status === 404) {
                    this.log.error('[API] Resource not found. Please check the app id and device id.');
                }
            } else if (error.request) {
                // Request was made but no response received
                this.log.error(`[API] Error in ${method}: No response received - ${error.message}`);
                this.log.error('[API] Please check your network connection and hub address.');
            } else {
                this.log.error(`[API] Error in ${method}: ${error.message}`);
            }
        } else if (error instanceof Error) {
            this.log.error(`[API] Error in ${method}: ${error.message}`);
        } else {
            this.log.error(`[API] Unknown error in ${method}: ${error}`);
        }
    }
}

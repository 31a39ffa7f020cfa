/**
 * RouterConfig - read-only, process-wide settings visible to every request.
 */
export interface RouterConfig {
    /**
     * A string setting, '' when unset.
     */
    config(key: string): string;

    production(): boolean;
}

const ENV_PREFIX = 'ROUTEKIT_';

/**
 * Configuration held in memory.
 */
export class StaticRouterConfig implements RouterConfig {
    constructor(
        private readonly settings: ReadonlyMap<string, string> = new Map(),
        private readonly isProduction = false,
    ) {}

    /**
     * Build from environment variables: ROUTEKIT_SESSION_NAME=abc becomes the
     * setting 'session_name'. Production when NODE_ENV is 'production'.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): StaticRouterConfig {
        const settings = new Map<string, string>();
        for (const [name, value] of Object.entries(env)) {
            if (name.startsWith(ENV_PREFIX) && value !== undefined) {
                settings.set(name.substring(ENV_PREFIX.length).toLowerCase(), value);
            }
        }
        return new StaticRouterConfig(settings, env.NODE_ENV === 'production');
    }

    config(key: string): string {
        return this.settings.get(key) ?? '';
    }

    production(): boolean {
        return this.isProduction;
    }
}

/**
 * DI token for RouterConfig injection.
 */
export const ROUTER_CONFIG_TOKEN = Symbol.for('RouterConfig');

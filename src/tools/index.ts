import { ToolRegistry } from '../registry/tool-registry.js';
import type { ServerName } from '../types/index.js';
import type { ToolDependencies } from './dependencies.js';
import { registerArxivTools } from './arxiv-tools.js';
import { registerBgsTools } from './bgs-tools.js';
import { registerClaimmTools } from './claimm-tools.js';
import { registerCmmTools } from './cmm-tools.js';
import { registerComtradeTools } from './comtrade-tools.js';
import { registerScholarTools } from './scholar-tools.js';

export type { ToolDependencies } from './dependencies.js';

const REGISTRARS: Record<ServerName, (registry: ToolRegistry, deps: ToolDependencies) => void> = {
    arxiv: registerArxivTools,
    bgs: registerBgsTools,
    claimm: registerClaimmTools,
    cmm: registerCmmTools,
    comtrade: registerComtradeTools,
    scholar: registerScholarTools,
};

/**
 * Build a sealed registry holding the tools of the given servers.
 */
export function buildRegistry(servers: readonly ServerName[], deps: ToolDependencies): ToolRegistry {
    const registry = new ToolRegistry();
    for (const server of new Set(servers)) {
        REGISTRARS[server](registry, deps);
    }
    registry.seal();
    return registry;
}

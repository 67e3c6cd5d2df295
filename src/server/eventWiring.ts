// mcp-swarm-orchestrator/src/server/eventWiring.ts
// Wire EventBus events → MCP logging notifications + resource change signals

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { eventBus, type SwarmEventName, type SwarmEvents } from '../services/events.js';
import { logger } from '../services/logger.js';
import { errorMessage } from '../services/errors.js';

type NotifyLevel = 'debug' | 'info' | 'warning' | 'error';

/** Forward one bus event; returns its unsubscribe function */
function forward<K extends SwarmEventName>(
  server: McpServer,
  event: K,
  level: (data: SwarmEvents[K]) => NotifyLevel,
  resourcesChanged: boolean = false,
): () => void {
  const handler = (data: SwarmEvents[K]): void => {
    server.sendLoggingMessage({ level: level(data), data: { event, ...data } })
      .catch((err: unknown) => logger.debug(`Logging notification for ${event} dropped: ${errorMessage(err)}`));
    if (resourcesChanged) server.sendResourceListChanged();
  };
  eventBus.onEvent(event, handler);
  return () => eventBus.offEvent(event, handler);
}

export function wireEvents(server: McpServer): () => void {
  const detachers = [
    forward(server, 'swarm:started', () => 'info', true),
    forward(server, 'swarm:completed', () => 'info', true),
    forward(server, 'swarm:aborted', () => 'error', true),
    forward(server, 'handoff:triggered', () => 'info'),
    forward(server, 'handoff:completed', () => 'debug'),
    forward(server, 'handoff:suppressed', () => 'info'),
    forward(server, 'handoff:blocked', () => 'warning'),
    forward(server, 'routing:threshold-changed', () => 'info'),
    forward(server, 'hitl:paused', (d) => d.category === 'critical' ? 'warning' : 'info'),
    forward(server, 'hitl:decision', (d) => d.approved ? 'info' : 'warning'),
  ];
  return () => detachers.forEach(d => d());
}

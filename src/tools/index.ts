import { CLUSTER_TOOLS } from "./cluster";
import { ETCD_TOOLS } from "./etcd";
import { FILESYSTEM_TOOLS } from "./filesystem";
import { INSPECTION_TOOLS } from "./inspection";
import { NETWORK_TOOLS } from "./network";
import { NODE_TOOLS } from "./nodes";
import { SERVICE_TOOLS } from "./services";
import { STORAGE_TOOLS } from "./storage";
import { ToolDefinition, ToolDescriptor } from "./types";

export * from "./types";

export interface ToolGroup {
  name: string;
  tools: ToolDefinition[];
}

// Lookup and listing order.
export const TOOL_GROUPS: ToolGroup[] = [
  { name: "inspection", tools: INSPECTION_TOOLS },
  { name: "filesystem", tools: FILESYSTEM_TOOLS },
  { name: "network", tools: NETWORK_TOOLS },
  { name: "services", tools: SERVICE_TOOLS },
  { name: "storage", tools: STORAGE_TOOLS },
  { name: "cluster", tools: CLUSTER_TOOLS },
  { name: "nodes", tools: NODE_TOOLS },
  { name: "etcd", tools: ETCD_TOOLS },
];

export function indexTools(groups: ToolGroup[]): Map<string, ToolDefinition> {
  const handlers = new Map<string, ToolDefinition>();
  for (const group of groups) {
    for (const tool of group.tools) {
      if (handlers.has(tool.name)) {
        throw new Error(`Tool '${tool.name}' in group '${group.name}' is already registered`);
      }
      handlers.set(tool.name, tool);
    }
  }
  return handlers;
}

// tool call handler
export const toolCallHandlers: Map<string, ToolDefinition> = indexTools(TOOL_GROUPS);

// tool call list
export const TALOS_TOOLS: ToolDescriptor[] = TOOL_GROUPS.flatMap((group) =>
  group.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
);

export function describeTools(): ToolDescriptor[] {
  return TALOS_TOOLS;
}

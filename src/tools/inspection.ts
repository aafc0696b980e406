import { z } from "zod";
import { withContext } from "../errors";
import { defineTool, kubernetesNamespace, nodeArg, nodeArgs } from "./types";

export const CONTAINERS = defineTool({
  name: "containers",
  description: "List running containers on a Talos node with their current status",
  args: {
    node: nodeArg(),
    kubernetes: z
      .boolean()
      .describe("Use the k8s.io containerd namespace to list Kubernetes containers (defaults to false)")
      .default(false),
  },
  async run({ node, kubernetes }, talosctl) {
    const args = nodeArgs(node, "containers");
    if (kubernetes) {
      args.push("--kubernetes");
    }
    const containers = await talosctl.run(args);
    return { containers, namespace: kubernetesNamespace(kubernetes) };
  },
});

export const STATS = defineTool({
  name: "stats",
  description: "Get resource usage statistics (CPU, memory) for containers on a Talos node",
  args: {
    node: nodeArg(),
    kubernetes: z
      .boolean()
      .describe("Use the k8s.io containerd namespace to get Kubernetes containers stats (defaults to false)")
      .default(false),
  },
  async run({ node, kubernetes }, talosctl) {
    const args = nodeArgs(node, "stats");
    if (kubernetes) {
      args.push("--kubernetes");
    }
    const stats = await talosctl.run(args);
    return { stats, namespace: kubernetesNamespace(kubernetes) };
  },
});

export const GET_PROCESSES = defineTool({
  name: "get_processes",
  description: "List running processes on a Talos node",
  args: {
    node: nodeArg(),
    sort: z.enum(["rss", "cpu"]).describe("Column to sort output by (defaults to 'rss')").default("rss"),
  },
  async run({ node, sort }, talosctl) {
    const processes = await talosctl.run(nodeArgs(node, "processes", "--sort", sort));
    return { processes, sort_by: sort };
  },
});

export const MEMORY_VERBOSE = defineTool({
  name: "memory_verbose",
  description: "Get detailed memory usage information from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const memory = await talosctl.run(nodeArgs(node, "memory", "--verbose"));
    return { memory_verbose: memory };
  },
});

async function settle<T>(pending: Promise<T>): Promise<PromiseSettledResult<T>> {
  try {
    return { status: "fulfilled", value: await pending };
  } catch (reason) {
    return { status: "rejected", reason };
  }
}

// Both queries always run; the first failure fails the tool, so there is no partial result.
export const GET_CPU_MEMORY_USAGE = defineTool({
  name: "get_cpu_memory_usage",
  description: "Get CPU and memory usage statistics from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const memory = await settle(talosctl.run(nodeArgs(node, "memory")));
    const cpu = await settle(talosctl.run(nodeArgs(node, "cgroups", "--preset", "cpu")));
    if (memory.status === "rejected") {
      throw withContext(memory.reason, "memory query failed");
    }
    if (cpu.status === "rejected") {
      throw withContext(cpu.reason, "cpu cgroups query failed");
    }
    return { memory: memory.value, cpu: cpu.value };
  },
});

export const INSPECTION_TOOLS = [
  CONTAINERS,
  STATS,
  GET_PROCESSES,
  MEMORY_VERBOSE,
  GET_CPU_MEMORY_USAGE,
];

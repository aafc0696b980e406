import { z } from "zod";
import { defineTool, kubernetesNamespace, nodeArg, nodeArgs } from "./types";

export const DMESG = defineTool({
  name: "dmesg",
  description: "Get kernel ring buffer messages (system logs) from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const dmesg = await talosctl.run(nodeArgs(node, "dmesg"));
    return { dmesg };
  },
});

export const SERVICE = defineTool({
  name: "service",
  description: "Manage services on a Talos node (get status, start, stop, restart)",
  args: {
    node: nodeArg(),
    service: z.string().describe("Name of the service to manage (e.g., kubelet, etcd, containerd)"),
    action: z
      .enum(["status", "start", "stop", "restart"])
      .describe("Action to perform on the service (defaults to 'status')")
      .default("status"),
  },
  async run({ node, service, action }, talosctl) {
    const output = await talosctl.run(nodeArgs(node, "service", service, action));
    return { service: output };
  },
});

export const RESTART = defineTool({
  name: "restart",
  description: "Restart a specific service on a Talos node",
  args: {
    node: nodeArg("IP address or hostname of the Talos node"),
    service: z.string().describe("Name of the service to restart (e.g., kubelet, etcd, containerd)"),
  },
  async run({ node, service }, talosctl) {
    const restart = await talosctl.run(nodeArgs(node, "service", service, "restart"));
    return { restart };
  },
});

export const GET_LOGS = defineTool({
  name: "get_logs",
  description: "Get service logs from a Talos node",
  args: {
    node: nodeArg(),
    service: z.string().describe("Name of the service to get logs for (e.g., kubelet, etcd)"),
    tail: z
      .number()
      .int()
      .min(1)
      .describe("Number of lines to show from the end of the logs (e.g., 100)")
      .optional(),
    kubernetes: z
      .boolean()
      .describe("Use the k8s.io containerd namespace to access Kubernetes containers (defaults to false)")
      .default(false),
  },
  async run({ node, service, tail, kubernetes }, talosctl) {
    const args = nodeArgs(node, "logs", service);
    if (tail !== undefined) {
      args.push("--tail", String(tail));
    }
    if (kubernetes) {
      args.push("--kubernetes");
    }

    const logs = await talosctl.run(args);
    return {
      logs,
      service,
      tail_lines: tail ?? null,
      namespace: kubernetesNamespace(kubernetes),
    };
  },
});

export const GET_EVENTS = defineTool({
  name: "get_events",
  description: "Get system events from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const events = await talosctl.run(nodeArgs(node, "events"));
    return { events };
  },
});

export const SERVICE_TOOLS = [
  DMESG,
  SERVICE,
  RESTART,
  GET_LOGS,
  GET_EVENTS,
];

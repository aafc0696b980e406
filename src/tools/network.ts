import { z } from "zod";
import { CommandRunner } from "../utils/talosctl";
import { defineTool, nodeArg, nodeArgs } from "./types";

export const resourceArgs = {
  node: nodeArg(),
  namespace: z
    .string()
    .describe("Resource namespace (default is to use default namespace per resource)")
    .optional(),
  output: z
    .enum(["json", "table", "yaml", "jsonpath"])
    .describe("Output mode (default: table)")
    .default("table"),
};

// `talosctl get <resource>` shared by interfaces, routes and disks
export async function getResource(
  talosctl: CommandRunner,
  resource: string,
  { node, namespace, output }: { node: string; namespace?: string; output: string },
): Promise<string> {
  const args = nodeArgs(node, "get", resource);
  if (namespace !== undefined) {
    args.push("--namespace", namespace);
  }
  args.push("--output", output);
  return talosctl.run(args);
}

export const INTERFACES = defineTool({
  name: "interfaces",
  description: "Get detailed network interface information including addresses and links",
  args: resourceArgs,
  async run(args, talosctl) {
    const interfaces = await getResource(talosctl, "addresses", args);
    return { interfaces, namespace: args.namespace ?? null, output_format: args.output };
  },
});

export const ROUTES = defineTool({
  name: "routes",
  description: "Get network routing table information for a Talos node",
  args: resourceArgs,
  async run(args, talosctl) {
    const routes = await getResource(talosctl, "routes", args);
    return { routes, namespace: args.namespace ?? null, output_format: args.output };
  },
});

export const GET_NETSTAT = defineTool({
  name: "get_netstat",
  description: "Get network connection statistics from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const netstat = await talosctl.run(nodeArgs(node, "netstat"));
    return { netstat };
  },
});

export const CAPTURE_PACKETS = defineTool({
  name: "capture_packets",
  description: "Capture network packets on a Talos node interface",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to capture from"),
    interface: z.string().describe("Network interface to capture from (defaults to eth0)").default("eth0"),
    duration: z.string().describe("Duration to capture packets (defaults to 10s)").default("10s"),
  },
  async run({ node, interface: iface, duration }, talosctl) {
    const packets = await talosctl.run(nodeArgs(node, "pcap", "--interface", iface, "--duration", duration));
    return { packets };
  },
});

export const GET_NETWORK_IO_CGROUPS = defineTool({
  name: "get_network_io_cgroups",
  description: "Get network I/O cgroup statistics from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const networkIo = await talosctl.run(nodeArgs(node, "cgroups", "--preset", "io"));
    return { network_io: networkIo };
  },
});

export const LIST_NETWORK_INTERFACES = defineTool({
  name: "list_network_interfaces",
  description: "List network interfaces on a Talos node (legacy method)",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const interfaces = await talosctl.run(nodeArgs(node, "list", "/sys/class/net"));
    return { interfaces };
  },
});

export const NETWORK_TOOLS = [
  INTERFACES,
  ROUTES,
  GET_NETSTAT,
  CAPTURE_PACKETS,
  GET_NETWORK_IO_CGROUPS,
  LIST_NETWORK_INTERFACES,
];

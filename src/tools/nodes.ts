import { z } from "zod";
import { defineTool, nodeArg, nodeArgs } from "./types";

// Lifecycle operations only report that talosctl accepted the request;
// they do not wait for the node to come back.

export const REBOOT_NODE = defineTool({
  name: "reboot_node",
  description: "Reboot a Talos node (DESTRUCTIVE OPERATION)",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to reboot"),
  },
  async run({ node }, talosctl) {
    await talosctl.run(nodeArgs(node, "reboot"));
    return { status: "reboot initiated" };
  },
});

export const SHUTDOWN_NODE = defineTool({
  name: "shutdown_node",
  description: "Shutdown a Talos node (DESTRUCTIVE OPERATION)",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to shutdown"),
  },
  async run({ node }, talosctl) {
    await talosctl.run(nodeArgs(node, "shutdown"));
    return { status: "node shutdown initiated" };
  },
});

export const RESET_NODE = defineTool({
  name: "reset_node",
  description: "Reset a Talos node to factory defaults (DESTRUCTIVE OPERATION)",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to reset"),
  },
  async run({ node }, talosctl) {
    await talosctl.run(nodeArgs(node, "reset"));
    return { status: "node reset initiated" };
  },
});

export const UPGRADE_NODE = defineTool({
  name: "upgrade_node",
  description: "Upgrade a Talos node to a new image version",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to upgrade"),
    image: z
      .string()
      .describe("Container image to upgrade to (defaults to latest installer)")
      .default("ghcr.io/siderolabs/installer:latest"),
  },
  async run({ node, image }, talosctl) {
    await talosctl.run(nodeArgs(node, "upgrade", "--image", image));
    return { status: "upgrade initiated" };
  },
});

export const UPGRADE_K8S = defineTool({
  name: "upgrade_k8s",
  description: "Upgrade Kubernetes cluster version",
  args: {
    from: z.string().describe("Current Kubernetes version (defaults to 1.28.0)").default("1.28.0"),
    to: z.string().describe("Target Kubernetes version (defaults to 1.29.0)").default("1.29.0"),
  },
  async run({ from, to }, talosctl) {
    await talosctl.run(["upgrade-k8s", "--from", from, "--to", to]);
    return { status: "k8s upgrade initiated" };
  },
});

export const NODE_TOOLS = [
  REBOOT_NODE,
  SHUTDOWN_NODE,
  RESET_NODE,
  UPGRADE_NODE,
  UPGRADE_K8S,
];

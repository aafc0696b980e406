import { z } from "zod";
import { defineTool, nodeArg, nodeArgs } from "./types";

export const APPLY_CONFIG = defineTool({
  name: "apply_config",
  description: "Apply a configuration file to a Talos node",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to configure"),
    file: z.string().describe("Path to the configuration file to apply"),
  },
  async run({ node, file }, talosctl) {
    await talosctl.run(nodeArgs(node, "apply-config", "--file", file));
    return { status: "config applied" };
  },
});

export const VALIDATE_CONFIG = defineTool({
  name: "validate_config",
  description: "Validate a Talos configuration file",
  args: {
    config: z.string().describe("Path to the configuration file to validate"),
    mode: z.string().describe("Validation mode (defaults to 'container')").default("container"),
  },
  async run({ config, mode }, talosctl) {
    const validation = await talosctl.run(["validate", "--config", config, "--mode", mode]);
    return { validation };
  },
});

export const GET_ETCD_STATUS = defineTool({
  name: "get_etcd_status",
  description: "Get etcd cluster status from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const status = await talosctl.run(nodeArgs(node, "etcd", "status"));
    return { etcd_status: status };
  },
});

export const GET_ETCD_MEMBERS = defineTool({
  name: "get_etcd_members",
  description: "Get etcd cluster member information from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const members = await talosctl.run(nodeArgs(node, "etcd", "members"));
    return { etcd_members: members };
  },
});

export const BOOTSTRAP_ETCD = defineTool({
  name: "bootstrap_etcd",
  description: "Bootstrap etcd cluster on a Talos node",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to bootstrap"),
  },
  async run({ node }, talosctl) {
    await talosctl.run(nodeArgs(node, "bootstrap"));
    return { status: "etcd bootstrapped" };
  },
});

export const DEFRAG_ETCD = defineTool({
  name: "defrag_etcd",
  description: "Defragment etcd database on a Talos node",
  args: {
    node: nodeArg("IP address or hostname of the Talos node to defragment"),
  },
  async run({ node }, talosctl) {
    await talosctl.run(nodeArgs(node, "etcd", "defrag"));
    return { status: "etcd defragmented" };
  },
});

export const ETCD_TOOLS = [
  APPLY_CONFIG,
  VALIDATE_CONFIG,
  GET_ETCD_STATUS,
  GET_ETCD_MEMBERS,
  BOOTSTRAP_ETCD,
  DEFRAG_ETCD,
];

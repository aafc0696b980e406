import { defineTool, nodeArg, nodeArgs } from "./types";
import { getResource, resourceArgs } from "./network";

export const DISKS = defineTool({
  name: "disks",
  description: "Get detailed disk information from a Talos node",
  args: resourceArgs,
  async run(args, talosctl) {
    const disks = await getResource(talosctl, "disks", args);
    return { disks, namespace: args.namespace ?? null, output_format: args.output };
  },
});

export const LIST_DISKS = defineTool({
  name: "list_disks",
  description: "List disk devices on a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const disks = await talosctl.run(nodeArgs(node, "list", "/sys/block"));
    return { disks };
  },
});

export const STORAGE_TOOLS = [
  DISKS,
  LIST_DISKS,
];

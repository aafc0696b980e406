import { z } from "zod";
import { defineTool, nodeArg, nodeArgs } from "./types";

export const LIST = defineTool({
  name: "list",
  description: "List files and directories at a specified path on a Talos node",
  args: {
    node: nodeArg(),
    path: z.string().describe("Directory path to list (defaults to root /)").default("/"),
    long: z.boolean().describe("Display additional file details").default(false),
    humanize: z.boolean().describe("Humanize size and time in the output").default(false),
    recurse: z.boolean().describe("Recurse into subdirectories").default(false),
    depth: z.number().int().min(1).describe("Maximum recursion depth (defaults to 1)").default(1),
    type: z
      .array(z.enum(["f", "d", "l", "L"]))
      .describe("Filter by specified file types")
      .optional(),
  },
  async run({ node, path, long, humanize, recurse, depth, type }, talosctl) {
    const args = nodeArgs(node, "list", path);
    if (long) {
      args.push("--long");
    }
    if (humanize) {
      args.push("--humanize");
    }
    // talosctl rejects --recurse together with --depth
    if (recurse) {
      args.push("--recurse");
    } else if (depth !== 1) {
      args.push("--depth", String(depth));
    }
    for (const fileType of type ?? []) {
      args.push("--type", fileType);
    }

    const list = await talosctl.run(args);
    return { list, path, long, humanize, recurse, depth, types: type ?? null };
  },
});

export const READ = defineTool({
  name: "read",
  description: "Read the contents of a file on a Talos node",
  args: {
    node: nodeArg(),
    path: z.string().describe("Full path to the file to read"),
  },
  async run({ node, path }, talosctl) {
    const content = await talosctl.run(nodeArgs(node, "read", path));
    return { content };
  },
});

export const COPY = defineTool({
  name: "copy",
  description: "Copy files to/from a Talos node",
  args: {
    node: nodeArg("IP address or hostname of the Talos node"),
    source: z.string().describe("Source file path (local or remote)"),
    destination: z.string().describe("Destination file path (local or remote)"),
  },
  async run({ node, source, destination }, talosctl) {
    const copy = await talosctl.run(nodeArgs(node, "copy", source, destination));
    return { copy };
  },
});

export const GET_USAGE = defineTool({
  name: "get_usage",
  description: "Get disk usage information for a path on a Talos node",
  args: {
    node: nodeArg(),
    path: z.string().describe("Path to check disk usage for (defaults to root /)").default("/"),
  },
  async run({ node, path }, talosctl) {
    const usage = await talosctl.run(nodeArgs(node, "usage", path));
    return { usage };
  },
});

export const GET_MOUNTS = defineTool({
  name: "get_mounts",
  description: "Get filesystem mount information from a Talos node",
  args: {
    node: nodeArg(),
  },
  async run({ node }, talosctl) {
    const mounts = await talosctl.run(nodeArgs(node, "mounts"));
    return { mounts };
  },
});

export const FILESYSTEM_TOOLS = [
  LIST,
  READ,
  COPY,
  GET_USAGE,
  GET_MOUNTS,
];

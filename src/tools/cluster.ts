import { z } from "zod";
import { ValidationError, withContext } from "../errors";
import { defineTool, nodeArg, nodeArgs } from "./types";

export const DEFAULT_CONTROL_PLANES = ["192.168.1.77"];

export const GET_HEALTH = defineTool({
  name: "get_health",
  description: "Check the health status of the Talos cluster",
  args: {
    control_planes: z
      .array(z.string())
      .describe("Array of IP addresses or hostnames of control plane nodes (defaults to [192.168.1.77])")
      .default(DEFAULT_CONTROL_PLANES),
    worker_nodes: z
      .array(z.string())
      .describe("Array of IP addresses or hostnames of worker nodes")
      .optional(),
    init_node: z.string().describe("IP address or hostname of the init node").optional(),
    timeout: z.string().describe("Timeout duration for health check (defaults to 120s)").default("120s"),
    run_e2e: z.boolean().describe("Run Kubernetes e2e test (defaults to false)").default(false),
    k8s_endpoint: z.string().describe("Use endpoint instead of kubeconfig default").optional(),
    server: z.boolean().describe("Run server-side check (defaults to true)").default(true),
  },
  async run(params, talosctl) {
    const {
      control_planes: controlPlanes,
      worker_nodes: workerNodes,
      init_node: initNode,
      timeout,
      run_e2e: runE2e,
      k8s_endpoint: k8sEndpoint,
      server,
    } = params;

    if (controlPlanes.length === 0) {
      throw new ValidationError("At least one control plane node must be specified");
    }

    // the first control plane serves the health API
    const args = nodeArgs(controlPlanes[0], "health", "--control-plane-nodes", controlPlanes.join(","));
    if (workerNodes) {
      args.push("--worker-nodes", workerNodes.join(","));
    }
    if (initNode !== undefined) {
      args.push("--init-node", initNode);
    }
    args.push("--wait-timeout", timeout);
    if (runE2e) {
      args.push("--run-e2e");
    }
    if (k8sEndpoint !== undefined) {
      args.push("--k8s-endpoint", k8sEndpoint);
    }
    if (!server) {
      args.push("--server=false");
    }

    const health = await talosctl.run(args, "stderr").catch((err) => {
      throw withContext(err, "Health check failed");
    });

    return {
      health,
      cluster_info: {
        control_planes: controlPlanes,
        worker_nodes: workerNodes ?? null,
        init_node: initNode ?? null,
        timeout,
        run_e2e: runE2e,
        k8s_endpoint: k8sEndpoint ?? null,
        server_side: server,
      },
    };
  },
});

export const GET_VERSION = defineTool({
  name: "get_version",
  description: "Get Talos client version information",
  args: {
    short: z.boolean().describe("Print the short version (defaults to false)").default(false),
  },
  async run({ short }, talosctl) {
    const args = ["version", "--client"];
    if (short) {
      args.push("--short");
    }
    const version = await talosctl.run(args);
    return { version, short_format: short };
  },
});

export const GET_TIME = defineTool({
  name: "get_time",
  description: "Get current time from a Talos node",
  args: {
    node: nodeArg(),
    check: z.string().describe("Check server time against specified NTP server (e.g., 'pool.ntp.org')").optional(),
  },
  async run({ node, check }, talosctl) {
    if (!node) {
      throw new ValidationError("Time command requires a node to be specified. Please provide a node parameter.");
    }

    const args = nodeArgs(node, "time");
    if (check !== undefined) {
      args.push("--check", check);
    }
    const time = await talosctl.run(args);
    return { time, node, ntp_check: check ?? null };
  },
});

export const CLUSTER_TOOLS = [
  GET_HEALTH,
  GET_VERSION,
  GET_TIME,
];

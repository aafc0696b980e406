import { describeTools, indexTools, TOOL_GROUPS, toolCallHandlers } from "./index";
import { CONTAINERS } from "./inspection";

describe("tool registry", () => {
  it("lists every handler exactly once", () => {
    const names = describeTools().map((tool) => tool.name);

    expect(new Set(names).size).toBe(names.length);
    expect(names.length).toBe(toolCallHandlers.size);
    for (const name of names) {
      expect(toolCallHandlers.has(name)).toBe(true);
    }
    for (const name of toolCallHandlers.keys()) {
      expect(names).toContain(name);
    }
  });

  it("keeps the catalog order", () => {
    const names = describeTools().map((tool) => tool.name);

    expect(names).toHaveLength(35);
    expect(names.slice(0, 6)).toEqual([
      "containers", "stats", "get_processes", "memory_verbose", "get_cpu_memory_usage", "list",
    ]);
    expect(names.slice(-4)).toEqual(["get_etcd_status", "get_etcd_members", "bootstrap_etcd", "defrag_etcd"]);
  });

  it("rejects a tool registered in two groups", () => {
    expect(() => indexTools([
      { name: "inspection", tools: [CONTAINERS] },
      { name: "other", tools: [CONTAINERS] },
    ])).toThrow("Tool 'containers' in group 'other' is already registered");
  });

  it("covers every group", () => {
    expect(TOOL_GROUPS.map((group) => group.name)).toEqual([
      "inspection", "filesystem", "network", "services", "storage", "cluster", "nodes", "etcd",
    ]);
  });
});

describe("tool input schemas", () => {
  const schemaOf = (name: string) => {
    const tool = describeTools().find((candidate) => candidate.name === name);
    if (!tool) {
      throw new Error(`no tool ${name}`);
    }
    return tool.inputSchema;
  };

  it("marks arguments without defaults as required", () => {
    expect(schemaOf("list").required).toEqual(["node"]);
    expect(schemaOf("copy").required).toEqual(["node", "source", "destination"]);
    expect(schemaOf("get_health").required ?? []).toEqual([]);
    expect(schemaOf("upgrade_k8s").required ?? []).toEqual([]);
  });

  it("describes types, defaults and enums", () => {
    const list = schemaOf("list");

    expect(list.type).toBe("object");
    expect(list.properties.path).toMatchObject({ type: "string", default: "/" });
    expect(list.properties.depth).toMatchObject({ type: "integer", minimum: 1, default: 1 });
    expect(list.properties.recurse).toMatchObject({ type: "boolean", default: false });
    expect(list.properties.type).toMatchObject({
      type: "array",
      items: { type: "string", enum: ["f", "d", "l", "L"] },
    });
    expect(schemaOf("service").properties.action).toMatchObject({
      type: "string",
      enum: ["status", "start", "stop", "restart"],
      default: "status",
    });
    expect(schemaOf("get_health").properties.control_planes).toMatchObject({
      type: "array",
      items: { type: "string" },
      default: ["192.168.1.77"],
    });
    expect(schemaOf("get_logs").properties.tail).toMatchObject({ type: "integer", minimum: 1 });
  });

  it("carries the argument descriptions", () => {
    expect(schemaOf("read").properties.node).toMatchObject({
      type: "string",
      description: "IP address or hostname of the Talos node to query",
    });
  });
});

import { MissingParameterError, ValidationError } from "../errors";
import { FakeTalosctl } from "../utils/fake-talosctl";
import { COPY, GET_MOUNTS, GET_USAGE, LIST, READ } from "./filesystem";

describe("list", () => {
  it("lists the root path with defaults", async () => {
    const talosctl = new FakeTalosctl().respond("etc\nvar\n");

    const result = await LIST.invoke({ node: "10.0.0.5" }, talosctl);

    expect(talosctl.argv).toEqual([["--nodes", "10.0.0.5", "list", "/"]]);
    expect(result).toEqual({
      list: "etc\nvar\n",
      path: "/",
      long: false,
      humanize: false,
      recurse: false,
      depth: 1,
      types: null,
    });
  });

  it("drops depth when recursing", async () => {
    const talosctl = new FakeTalosctl();

    const result = await LIST.invoke({ node: "10.0.0.5", path: "/var/log", recurse: true, depth: 5 }, talosctl);

    const [args] = talosctl.argv;
    expect(args).toContain("--recurse");
    expect(args).not.toContain("--depth");
    expect(args).toEqual(["--nodes", "10.0.0.5", "list", "/var/log", "--recurse"]);
    expect(result).toMatchObject({ recurse: true, depth: 5 });
  });

  it("passes a non-default depth, flags and type filters in order", async () => {
    const talosctl = new FakeTalosctl();

    await LIST.invoke(
      { node: "10.0.0.5", path: "/etc", long: true, humanize: true, depth: 3, type: ["f", "l"] },
      talosctl,
    );

    expect(talosctl.argv[0]).toEqual([
      "--nodes", "10.0.0.5", "list", "/etc",
      "--long", "--humanize",
      "--depth", "3",
      "--type", "f", "--type", "l",
    ]);
  });

  it("rejects an unknown file type without calling talosctl", async () => {
    const talosctl = new FakeTalosctl();

    await expect(LIST.invoke({ node: "10.0.0.5", type: ["x"] }, talosctl)).rejects.toThrow(ValidationError);
    expect(talosctl.calls).toHaveLength(0);
  });

  it("rejects a depth below one", async () => {
    const talosctl = new FakeTalosctl();

    await expect(LIST.invoke({ node: "10.0.0.5", depth: 0 }, talosctl)).rejects.toThrow(ValidationError);
    await expect(LIST.invoke({ node: "10.0.0.5", depth: 0 }, talosctl)).rejects.toThrow("Invalid depth param");
    expect(talosctl.calls).toHaveLength(0);
  });
});

describe("read", () => {
  it("reads a file", async () => {
    const talosctl = new FakeTalosctl().respond("127.0.0.1 localhost\n");

    const result = await READ.invoke({ node: "10.0.0.5", path: "/etc/hosts" }, talosctl);

    expect(talosctl.argv).toEqual([["--nodes", "10.0.0.5", "read", "/etc/hosts"]]);
    expect(result).toEqual({ content: "127.0.0.1 localhost\n" });
  });

  it("requires a path", async () => {
    const talosctl = new FakeTalosctl();

    await expect(READ.invoke({ node: "10.0.0.5" }, talosctl)).rejects.toThrow(new MissingParameterError("path"));
    expect(talosctl.calls).toHaveLength(0);
  });
});

describe("copy, usage and mounts", () => {
  it("copies from source to destination", async () => {
    const talosctl = new FakeTalosctl().respond("done");

    const result = await COPY.invoke({ node: "10.0.0.5", source: "/var/log", destination: "/tmp/logs" }, talosctl);

    expect(talosctl.argv[0]).toEqual(["--nodes", "10.0.0.5", "copy", "/var/log", "/tmp/logs"]);
    expect(result).toEqual({ copy: "done" });
  });

  it("reports the first missing copy argument", async () => {
    await expect(COPY.invoke({ node: "10.0.0.5", destination: "/tmp" }, new FakeTalosctl()))
      .rejects.toThrow("Missing source param");
  });

  it("checks usage of the root path by default", async () => {
    const talosctl = new FakeTalosctl().respond("1024 /");

    expect(await GET_USAGE.invoke({ node: "10.0.0.5" }, talosctl)).toEqual({ usage: "1024 /" });
    expect(talosctl.argv[0]).toEqual(["--nodes", "10.0.0.5", "usage", "/"]);
  });

  it("lists mounts", async () => {
    const talosctl = new FakeTalosctl().respond("overlay /");

    expect(await GET_MOUNTS.invoke({ node: "10.0.0.5" }, talosctl)).toEqual({ mounts: "overlay /" });
    expect(talosctl.argv[0]).toEqual(["--nodes", "10.0.0.5", "mounts"]);
  });
});

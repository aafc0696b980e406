import { MissingParameterError } from "../errors";
import { FakeTalosctl } from "../utils/fake-talosctl";
import {
  APPLY_CONFIG,
  BOOTSTRAP_ETCD,
  DEFRAG_ETCD,
  GET_ETCD_MEMBERS,
  GET_ETCD_STATUS,
  VALIDATE_CONFIG,
} from "./etcd";

describe("machine configuration", () => {
  it("applies a config file", async () => {
    const talosctl = new FakeTalosctl();

    expect(await APPLY_CONFIG.invoke({ node: "10.0.0.5", file: "worker.yaml" }, talosctl))
      .toEqual({ status: "config applied" });
    expect(talosctl.argv[0]).toEqual(["--nodes", "10.0.0.5", "apply-config", "--file", "worker.yaml"]);
  });

  it("requires the file to apply", async () => {
    const talosctl = new FakeTalosctl();

    await expect(APPLY_CONFIG.invoke({ node: "10.0.0.5" }, talosctl)).rejects.toThrow(new MissingParameterError("file"));
    expect(talosctl.calls).toHaveLength(0);
  });

  it("validates in container mode by default", async () => {
    const talosctl = new FakeTalosctl().respond("controlplane.yaml is valid for container mode");

    expect(await VALIDATE_CONFIG.invoke({ config: "controlplane.yaml" }, talosctl))
      .toEqual({ validation: "controlplane.yaml is valid for container mode" });
    expect(talosctl.argv[0]).toEqual(["validate", "--config", "controlplane.yaml", "--mode", "container"]);
  });

  it("validates in the requested mode", async () => {
    const talosctl = new FakeTalosctl();

    await VALIDATE_CONFIG.invoke({ config: "controlplane.yaml", mode: "metal" }, talosctl);

    expect(talosctl.argv[0]).toEqual(["validate", "--config", "controlplane.yaml", "--mode", "metal"]);
  });
});

describe("etcd", () => {
  it("reads status and members", async () => {
    const talosctl = new FakeTalosctl().respond("leader", "member-1");

    expect(await GET_ETCD_STATUS.invoke({ node: "10.0.0.2" }, talosctl)).toEqual({ etcd_status: "leader" });
    expect(await GET_ETCD_MEMBERS.invoke({ node: "10.0.0.2" }, talosctl)).toEqual({ etcd_members: "member-1" });
    expect(talosctl.argv).toEqual([
      ["--nodes", "10.0.0.2", "etcd", "status"],
      ["--nodes", "10.0.0.2", "etcd", "members"],
    ]);
  });

  it("bootstraps and defragments", async () => {
    const talosctl = new FakeTalosctl();

    expect(await BOOTSTRAP_ETCD.invoke({ node: "10.0.0.2" }, talosctl)).toEqual({ status: "etcd bootstrapped" });
    expect(await DEFRAG_ETCD.invoke({ node: "10.0.0.2" }, talosctl)).toEqual({ status: "etcd defragmented" });
    expect(talosctl.argv).toEqual([
      ["--nodes", "10.0.0.2", "bootstrap"],
      ["--nodes", "10.0.0.2", "etcd", "defrag"],
    ]);
  });
});

import { describe, expect, it, vi } from "vitest";
import { RemoteNotFoundError, RemoteOperationError } from "../errors.js";
import { GlabClient, type GlabResult } from "../gitlab/glab.js";

function ok(body: unknown): GlabResult {
  return { status: 0, stdout: JSON.stringify(body), stderr: "" };
}

function projectBody(id: number) {
  return {
    id,
    name: "widget",
    path: "widget",
    path_with_namespace: "Framestore/team-a/widget",
    description: null,
    creator_id: 4,
    last_activity_at: "2024-03-05T10:20:30.000Z",
    web_url: "https://gitlab.test/Framestore/team-a/widget",
    ssh_url_to_repo: "git@gitlab.test:Framestore/team-a/widget.git",
    default_branch: "master",
    namespace: { id: 2, full_path: "Framestore/team-a" },
    merge_method: "merge"
  };
}

describe("GlabClient", () => {
  it("looks groups up by url-encoded path", () => {
    const exec = vi.fn((_args: string[], _input?: string) =>
      ok({ id: 2, name: "team-a", full_path: "Framestore/team-a", parent_id: 1 })
    );
    const client = new GlabClient({ exec });

    expect(client.getGroup("Framestore/team-a")).toEqual({
      id: 2,
      name: "team-a",
      full_path: "Framestore/team-a",
      parent_id: 1
    });
    expect(exec).toHaveBeenCalledWith(["api", "groups/Framestore%2Fteam-a", "-X", "GET"], undefined);
  });

  it("passes the hostname through", () => {
    const exec = vi.fn((_args: string[], _input?: string) => ok({ id: 1, name: "Framestore", full_path: "Framestore" }));
    new GlabClient({ hostname: "gitlab.studio.test", exec }).getGroup(1);

    expect(exec.mock.calls[0]?.[0]).toEqual(["api", "groups/1", "-X", "GET", "--hostname", "gitlab.studio.test"]);
  });

  it("maps a 404 to RemoteNotFoundError", () => {
    const exec = vi.fn(
      (_args: string[], _input?: string): GlabResult => ({
        status: 1,
        stdout: "",
        stderr: "glab: 404 Group Not Found (HTTP 404)\n"
      })
    );

    expect(() => new GlabClient({ exec }).getGroup("Framestore/missing")).toThrow(RemoteNotFoundError);
  });

  it("propagates other failures verbatim", () => {
    const exec = vi.fn(
      (_args: string[], _input?: string): GlabResult => ({
        status: 1,
        stdout: "",
        stderr: "glab: 403 Forbidden (HTTP 403)\n"
      })
    );

    const call = () => new GlabClient({ exec }).getProject(3);
    expect(call).toThrow(RemoteOperationError);
    expect(call).toThrow("glab: 403 Forbidden (HTTP 403)");
    expect(exec).toHaveBeenCalledTimes(2);
  });

  it("rejects a response of the wrong shape", () => {
    const exec = vi.fn((_args: string[], _input?: string) => ok({ id: "two" }));
    expect(() => new GlabClient({ exec }).getGroup(2)).toThrow(/Unexpected response from groups\/2/);
  });

  it("follows pages until a short page", () => {
    const full = Array.from({ length: 100 }, (_, i) => ({ id: i + 1, path: `p${i + 1}` }));
    const exec = vi.fn((args: string[], _input?: string) =>
      ok(args[1]?.endsWith("&page=1") ? full : [{ id: 101, path: "p101" }])
    );

    const projects = new GlabClient({ exec }).listGroupProjects(2);

    expect(projects).toHaveLength(101);
    expect(exec.mock.calls.map(([args]) => args[1])).toEqual([
      "groups/2/projects?with_shared=false&archived=false&per_page=100&page=1",
      "groups/2/projects?with_shared=false&archived=false&per_page=100&page=2"
    ]);
  });

  it("keeps the raw project record as attributes", () => {
    const exec = vi.fn((_args: string[], _input?: string) => ok(projectBody(3)));

    const project = new GlabClient({ exec }).getProject(3);

    expect(project.namespace_id).toBe(2);
    expect(project.description).toBeNull();
    expect(project.attributes["merge_method"]).toBe("merge");
  });

  it("sends mutations as a JSON body on stdin", () => {
    const exec = vi.fn((_args: string[], _input?: string): GlabResult => ({ status: 0, stdout: "", stderr: "" }));

    new GlabClient({ exec }).updateProject(3, { merge_method: "merge" });

    expect(exec).toHaveBeenCalledWith(
      ["api", "projects/3", "-X", "PUT", "-H", "Content-Type: application/json", "--input", "-"],
      JSON.stringify({ merge_method: "merge" })
    );
  });

  it("reads integration webhook properties", () => {
    const exec = vi.fn((_args: string[], _input?: string) =>
      ok({ active: true, properties: { webhook: "https://hooks.slack.test/services/test-hook" } })
    );

    expect(new GlabClient({ exec }).getIntegration(3, "slack")).toEqual({
      active: true,
      properties: { webhook: "https://hooks.slack.test/services/test-hook" }
    });
    expect(exec.mock.calls[0]?.[0][1]).toBe("projects/3/integrations/slack");
  });
});

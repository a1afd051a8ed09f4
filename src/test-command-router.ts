/**
 * Unit tests for command-router.ts against the in-memory collaborators
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { CommandRouter, type RouteContext } from "./command-router.js";
import { Connection } from "./connection.js";
import { AppError } from "./error-mapper.js";
import { createMemoryServices } from "./memory-services.js";
import { RecordingTransport } from "./testing.js";
import { isRecord } from "./type-guards.js";
import type { JsonValue } from "./types.js";

const T0 = 1_700_000_000_000;
const T0_ISO = "2023-11-14T22:13:20.000Z";

function record(value: JsonValue | undefined): Record<string, unknown> {
  assert.ok(isRecord(value), `expected an object, got ${JSON.stringify(value)}`);
  return value;
}

function setup(workspace: string | null = "w-1") {
  const workspaceId = workspace ?? undefined;
  const connection = new Connection({
    principal: { user_id: "u-1", username: "alice", workspace_id: workspaceId },
    transport: new RecordingTransport(),
    id: "c-1",
    now: T0,
  });
  connection.transition("connected");
  const router = new CommandRouter(createMemoryServices(() => new Date(T0)));
  const ctx: RouteContext = { connection, user_id: "u-1", workspace_id: workspaceId, idempotency_key: "k-1" };
  return { router, connection, ctx };
}

function rejectsWith(kind: string, message: string): (error: unknown) => boolean {
  return (error) => {
    assert.ok(error instanceof AppError);
    assert.strictEqual(error.kind, kind);
    assert.strictEqual(error.message, message);
    return true;
  };
}

describe("command-router", () => {
  // ==========================================================================
  // CHANNEL
  // ==========================================================================

  describe("channel commands", () => {
    it("answers ping", async () => {
      const { router, ctx } = setup();
      assert.deepStrictEqual(await router.execute(ctx, { type: "ping" }), { data: { message: "pong" } });
    });

    it("subscribes and unsubscribes the calling connection", async () => {
      const { router, ctx, connection } = setup();
      const subscribed = await router.execute(ctx, { type: "subscribe", topics: ["labels", "issues"] });
      assert.deepStrictEqual(subscribed.data, {
        subscribed_topics: ["labels", "issues"],
        message: "Successfully subscribed to topics",
      });

      const unsubscribed = await router.execute(ctx, { type: "unsubscribe", topics: ["issues"] });
      assert.deepStrictEqual(unsubscribed.data, {
        unsubscribed_topics: ["issues"],
        message: "Successfully unsubscribed from topics",
      });
      assert.deepStrictEqual([...connection.subscriptions], ["labels"]);
    });

    it("reports connection info", async () => {
      const { router, ctx } = setup();
      const info = record((await router.execute(ctx, { type: "get_connection_info" })).data);
      assert.strictEqual(info.connection_id, "c-1");
      assert.strictEqual(info.user_id, "u-1");
      assert.strictEqual(info.state, "connected");
    });
  });

  // ==========================================================================
  // LABELS
  // ==========================================================================

  describe("labels", () => {
    it("creates a label in the caller's workspace", async () => {
      const { router, ctx } = setup();
      const result = await router.execute(ctx, {
        type: "create_label",
        data: { name: "Bug", color: "#ff0000", level: "issue" },
      });
      const label = record(result.data);

      assert.strictEqual(typeof label.id, "string");
      assert.strictEqual(label.workspace_id, "w-1");
      assert.strictEqual(label.name, "Bug");
      assert.strictEqual(label.created_at, T0_ISO);
      assert.strictEqual(result.batchStats, undefined);
    });

    it("rejects a duplicate name ignoring case", async () => {
      const { router, ctx } = setup();
      await router.execute(ctx, { type: "create_label", data: { name: "Bug", color: "#f00", level: "issue" } });
      await assert.rejects(
        router.execute(ctx, { type: "create_label", data: { name: "bug", color: "#0f0", level: "issue" } }),
        rejectsWith("conflict", "Label with this name already exists")
      );
    });

    it("hides labels of other workspaces", async () => {
      const { router, ctx } = setup("w-1");
      const created = record(
        (await router.execute(ctx, { type: "create_label", data: { name: "Bug", color: "#f00", level: "issue" } })).data
      );
      const labelId = String(created.id);

      await assert.rejects(
        router.execute({ ...ctx, workspace_id: "w-2" }, { type: "delete_label", label_id: labelId }),
        rejectsWith("not_found", "Label not found")
      );
    });

    it("pages query results", async () => {
      const { router, ctx } = setup();
      for (const name of ["A", "B", "C"]) {
        await router.execute(ctx, { type: "create_label", data: { name, color: "#000", level: "project" } });
      }

      const page = record((await router.execute(ctx, { type: "query_labels", filters: { limit: 2, offset: 1 } })).data);
      assert.strictEqual(page.total, 3);
      assert.ok(Array.isArray(page.items));
      assert.deepStrictEqual(
        page.items.map((item: unknown) => (isRecord(item) ? item.name : undefined)),
        ["B", "C"]
      );
    });

    it("requires a workspace", async () => {
      const { router, ctx } = setup(null);
      await assert.rejects(
        router.execute(ctx, { type: "query_labels" }),
        rejectsWith("no_workspace", "No current workspace selected")
      );
    });
  });

  // ==========================================================================
  // BATCHES
  // ==========================================================================

  describe("batch labels", () => {
    it("creates what it can and reports per-item failures", async () => {
      const { router, ctx } = setup();
      const result = await router.execute(ctx, {
        type: "batch_create_labels",
        data: [
          { name: "Bug", color: "#f00", level: "issue" },
          { name: "Bug", color: "#0f0", level: "issue" },
          { name: "Feature", color: "#00f", level: "issue" },
        ],
      });

      const data = record(result.data);
      assert.strictEqual(data.total_created, 2);
      assert.strictEqual(data.total_errors, 1);
      assert.deepStrictEqual(data.errors, [{ index: 1, code: "CONFLICT", error: "Label with this name already exists" }]);
      assert.deepStrictEqual(result.batchStats, { total: 3, successful: 2, failed: 1, skipped: 0 });
    });

    it("names the label of each failed delete", async () => {
      const { router, ctx } = setup();
      const created = record(
        (await router.execute(ctx, { type: "create_label", data: { name: "Bug", color: "#f00", level: "issue" } })).data
      );
      const labelId = String(created.id);

      const result = await router.execute(ctx, { type: "batch_delete_labels", label_ids: [labelId, "missing"] });
      const data = record(result.data);
      assert.deepStrictEqual(data.deleted, [{ deleted: true, label_id: labelId }]);
      assert.deepStrictEqual(data.errors, [{ index: 1, code: "NOT_FOUND", error: "Label not found", label_id: "missing" }]);
      assert.deepStrictEqual(result.batchStats, { total: 2, successful: 1, failed: 1, skipped: 0 });
    });

    it("updates items independently", async () => {
      const { router, ctx } = setup();
      const created = record(
        (await router.execute(ctx, { type: "create_label", data: { name: "Bug", color: "#f00", level: "issue" } })).data
      );
      const labelId = String(created.id);

      const result = await router.execute(ctx, {
        type: "batch_update_labels",
        updates: [
          { label_id: labelId, data: { color: "#123456" } },
          { label_id: "missing", data: { name: "X" } },
        ],
      });
      const data = record(result.data);
      assert.strictEqual(data.total_updated, 1);
      assert.ok(Array.isArray(data.updated));
      assert.strictEqual(record(data.updated[0]).color, "#123456");
      assert.deepStrictEqual(result.batchStats, { total: 2, successful: 1, failed: 1, skipped: 0 });
    });
  });

  // ==========================================================================
  // OTHER DOMAINS
  // ==========================================================================

  describe("teams", () => {
    it("makes the creator an admin member", async () => {
      const { router, ctx } = setup();
      const team = record(
        (await router.execute(ctx, {
          type: "create_team",
          data: { name: "Core", team_key: "CORE", is_private: false },
        })).data
      );
      const members = (await router.execute(ctx, { type: "list_team_members", team_id: String(team.id) })).data;

      assert.deepStrictEqual(members, [{ team_id: team.id, user_id: "u-1", role: "admin", joined_at: T0_ISO }]);
      assert.strictEqual(team.description, null);
    });

    it("rejects a duplicate team key", async () => {
      const { router, ctx } = setup();
      await router.execute(ctx, { type: "create_team", data: { name: "Core", team_key: "CORE", is_private: false } });
      await assert.rejects(
        router.execute(ctx, { type: "create_team", data: { name: "Other", team_key: "CORE", is_private: true } }),
        rejectsWith("conflict", "Team with this key already exists")
      );
    });
  });

  describe("workspaces and invitations", () => {
    it("creates a workspace without a current one", async () => {
      const { router, ctx } = setup(null);
      const workspace = record(
        (await router.execute(ctx, { type: "create_workspace", data: { name: "Acme", url_key: "acme" } })).data
      );
      assert.strictEqual(workspace.name, "Acme");
      assert.strictEqual(workspace.logo_url, null);

      const current = await router.execute({ ...ctx, workspace_id: String(workspace.id) }, { type: "get_current_workspace" });
      assert.deepStrictEqual(current.data, workspace);
    });

    it("lets another user accept an invitation once", async () => {
      const { router, ctx } = setup("w-1");
      const invitation = record(
        (await router.execute(ctx, {
          type: "invite_workspace_member",
          data: { email: "Bob@Example.com", role: "member" },
        })).data
      );
      assert.strictEqual(invitation.email, "bob@example.com");
      assert.strictEqual(invitation.status, "pending");

      const invitee: RouteContext = { ...ctx, user_id: "u-2", workspace_id: undefined };
      const accepted = await router.execute(invitee, { type: "accept_invitation", invitation_id: String(invitation.id) });
      assert.deepStrictEqual(accepted.data, { accepted: true, invitation_id: invitation.id, workspace_id: "w-1" });

      await assert.rejects(
        router.execute(invitee, { type: "accept_invitation", invitation_id: String(invitation.id) }),
        rejectsWith("conflict", "Invitation is already accepted")
      );

      const members = await router.execute(ctx, { type: "query_workspace_members" });
      assert.deepStrictEqual(members.data, [{ workspace_id: "w-1", user_id: "u-2", role: "member", joined_at: T0_ISO }]);
    });
  });

  describe("issues", () => {
    it("numbers issues per team", async () => {
      const { router, ctx } = setup();
      const first = record((await router.execute(ctx, { type: "create_issue", data: { title: "One", team_id: "t-1" } })).data);
      const second = record((await router.execute(ctx, { type: "create_issue", data: { title: "Two", team_id: "t-1" } })).data);
      const other = record((await router.execute(ctx, { type: "create_issue", data: { title: "Three", team_id: "t-2" } })).data);

      assert.strictEqual(first.identifier, "ISS-1");
      assert.strictEqual(second.identifier, "ISS-2");
      assert.strictEqual(other.identifier, "ISS-1");
      assert.strictEqual(first.priority, "none");
      assert.deepStrictEqual(first.label_ids, []);
    });
  });
});

/**
 * Unit tests for command-classification.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  COMMAND_TYPES,
  classifyCommand,
  getChangeTopic,
  isCommandType,
} from "./command-classification.js";

describe("command-classification", () => {
  describe("isCommandType", () => {
    it("knows every command family", () => {
      for (const type of ["create_label", "subscribe", "create_team", "accept_invitation", "get_issue"]) {
        assert.strictEqual(isCommandType(type), true, type);
      }
    });

    it("rejects unknown names", () => {
      assert.strictEqual(isCommandType("drop_database"), false);
      assert.strictEqual(isCommandType(""), false);
      assert.strictEqual(isCommandType("toString"), false);
    });

    it("lists forty-one commands", () => {
      assert.strictEqual(COMMAND_TYPES.size, 41);
    });
  });

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  describe("isMutation", () => {
    it("marks create, update and delete commands as mutations", () => {
      assert.strictEqual(classifyCommand("create_label").isMutation, true);
      assert.strictEqual(classifyCommand("batch_delete_labels").isMutation, true);
      assert.strictEqual(classifyCommand("remove_team_member").isMutation, true);
      assert.strictEqual(classifyCommand("update_profile").isMutation, true);
    });

    it("marks queries and channel commands as read-only", () => {
      assert.strictEqual(classifyCommand("query_labels").isMutation, false);
      assert.strictEqual(classifyCommand("get_issue").isMutation, false);
      assert.strictEqual(classifyCommand("ping").isMutation, false);
      assert.strictEqual(classifyCommand("subscribe").isMutation, false);
    });
  });

  // ==========================================================================
  // WORKSPACE
  // ==========================================================================

  describe("requiresWorkspace flag", () => {
    it("requires a workspace for workspace-scoped work", () => {
      assert.strictEqual(classifyCommand("create_label").requiresWorkspace, true);
      assert.strictEqual(classifyCommand("query_issues").requiresWorkspace, true);
      assert.strictEqual(classifyCommand("get_current_workspace").requiresWorkspace, true);
    });

    it("exempts commands that name or create their workspace", () => {
      assert.strictEqual(classifyCommand("create_workspace").requiresWorkspace, false);
      assert.strictEqual(classifyCommand("update_workspace").requiresWorkspace, false);
      assert.strictEqual(classifyCommand("delete_workspace").requiresWorkspace, false);
      assert.strictEqual(classifyCommand("accept_invitation").requiresWorkspace, false);
      assert.strictEqual(classifyCommand("update_profile").requiresWorkspace, false);
    });

    it("exempts channel commands", () => {
      assert.strictEqual(classifyCommand("ping").requiresWorkspace, false);
      assert.strictEqual(classifyCommand("get_connection_info").requiresWorkspace, false);
    });
  });

  // ==========================================================================
  // CHANGE EVENTS
  // ==========================================================================

  describe("getChangeTopic", () => {
    it("publishes mutations on their domain topic", () => {
      assert.strictEqual(getChangeTopic("create_label"), "labels");
      assert.strictEqual(getChangeTopic("add_team_member"), "teams");
      assert.deepStrictEqual(classifyCommand("add_team_member"), {
        domain: "teams",
        isMutation: true,
        requiresWorkspace: true,
        changeEvent: "team.member_added",
      });
    });

    it("publishes nothing for queries or channel commands", () => {
      assert.strictEqual(getChangeTopic("query_labels"), undefined);
      assert.strictEqual(getChangeTopic("subscribe"), undefined);
    });
  });
});

import { describe, it, expect, beforeEach, vi } from "vitest";
import { createHarness, type Harness } from "../../test/harness";
import { Session } from "../../domain/session";
import {
  InvalidStateError,
  NotFoundError,
  NotPermittedError,
  TransactionFailureError,
  ValidationError,
} from "../../domain/errors";
import { MemoryIdeaRepository } from "../../repositories/memory.repository";
import { badgeFor } from "../verification.service";

describe("VerificationService", () => {
  let h: Harness;
  let admin: Session;

  beforeEach(async () => {
    h = createHarness();
    ({ session: admin } = await h.signUp("Root", { admin: true }));
  });

  describe("request", () => {
    it("files a pending request with stored proofs", async () => {
      const { user, session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, {
        claim: "Logistician",
        details: " ten years in freight ",
        proofs: [{ name: "licence.jpg", data: Buffer.from("jpg") }],
      });

      expect(req).toMatchObject({
        requesterId: user.id,
        claim: "Logistician",
        details: "ten years in freight",
        proofs: ["blob1-licence.jpg"],
        status: "pending",
        adminNote: null,
      });
      expect(await h.services.verifications.listMine(session)).toEqual([req]);
    });

    it("needs a login and a claim", async () => {
      await expect(
        h.services.verifications.request(Session.anonymous(), { claim: "Nurse" })
      ).rejects.toBeInstanceOf(NotPermittedError);

      const { session } = await h.signUp("Ada");
      await expect(h.services.verifications.request(session, { claim: " " })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it("keeps the claim exactly as typed", async () => {
      const { session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, { claim: "Logistician " });
      expect(req.claim).toBe("Logistician ");

      const outcome = await h.services.verifications.approve(admin, { requestId: req.id });
      expect(outcome.user.badge).toBe("Logistician  (Verified)");
    });

    it("refuses a request from an account deleted after login", async () => {
      const { user, session } = await h.signUp("Ada");
      await h.repos.users.delete(user.id);

      await expect(h.services.verifications.request(session, { claim: "Nurse" })).rejects.toMatchObject({
        kind: "NotFound",
        message: "User not found",
      });
      expect(await h.services.verifications.listByStatus(admin, "pending")).toEqual([]);
    });
  });

  describe("approve", () => {
    it("grants the badge and promotes ideas written before the request", async () => {
      const { user, session } = await h.signUp("Ada");
      const x = await h.services.ideas.submit(session, { title: "X", description: "d" });
      const y = await h.services.ideas.submit(session, { title: "Y", description: "d" });
      expect(x.priority).toBe(false);

      const req = await h.services.verifications.request(session, { claim: "Logistician" });
      const outcome = await h.services.verifications.approve(admin, { requestId: req.id, adminNote: " checked " });

      expect(outcome.request.status).toBe("approved");
      expect(outcome.request.adminNote).toBe("checked");
      expect(outcome.request.reviewerId).toBe(admin.currentUserId());
      expect(outcome.user.badge).toBe("Logistician (Verified)");
      expect(outcome.promotedIdeas.map((i) => i.id)).toEqual([x.id, y.id]);

      expect((await h.repos.users.findById(user.id))?.badge).toBe("Logistician (Verified)");
      expect((await h.repos.ideas.findById(x.id))?.priority).toBe(true);
      expect((await h.repos.ideas.findById(y.id))?.priority).toBe(true);
    });

    it("leaves other users' ideas alone", async () => {
      const { session: ada } = await h.signUp("Ada");
      const { session: bob } = await h.signUp("Bob");
      const bobs = await h.services.ideas.submit(bob, { title: "B", description: "d" });
      const req = await h.services.verifications.request(ada, { claim: "Nurse" });

      await h.services.verifications.approve(admin, { requestId: req.id });

      expect((await h.repos.ideas.findById(bobs.id))?.priority).toBe(false);
    });

    it("gives later ideas priority at submission", async () => {
      const { session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, { claim: "Nurse" });
      await h.services.verifications.approve(admin, { requestId: req.id });

      const idea = await h.services.ideas.submit(session, { title: "After", description: "d" });
      expect(idea.priority).toBe(true);
    });

    it("produces the same badge when the same claim is approved again", async () => {
      const { user, session } = await h.signUp("Ada");
      const first = await h.services.verifications.request(session, { claim: "Logistician" });
      const second = await h.services.verifications.request(session, { claim: "Logistician" });

      await h.services.verifications.approve(admin, { requestId: first.id });
      const again = await h.services.verifications.approve(admin, { requestId: second.id });

      expect(again.user.badge).toBe(badgeFor("Logistician"));
      expect((await h.repos.users.findById(user.id))?.badge).toBe("Logistician (Verified)");
    });

    it("stores the claim verbatim", async () => {
      const { session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, { claim: "<b>Dr.</b> & co" });
      const outcome = await h.services.verifications.approve(admin, { requestId: req.id });
      expect(outcome.user.badge).toBe("<b>Dr.</b> & co (Verified)");
    });

    it("is terminal", async () => {
      const { session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, { claim: "Nurse" });
      await h.services.verifications.approve(admin, { requestId: req.id });

      await expect(h.services.verifications.approve(admin, { requestId: req.id })).rejects.toBeInstanceOf(
        InvalidStateError
      );
      await expect(h.services.verifications.reject(admin, { requestId: req.id })).rejects.toThrow(
        "Verification request already approved"
      );
      expect((await h.repos.verifications.findById(req.id))?.status).toBe("approved");
    });

    it("is admin-only", async () => {
      const { session } = await h.signUp("Ada");
      const req = await h.services.verifications.request(session, { claim: "Nurse" });

      await expect(h.services.verifications.approve(session, { requestId: req.id })).rejects.toBeInstanceOf(
        NotPermittedError
      );
      await expect(
        h.services.verifications.approve(Session.anonymous(), { requestId: req.id })
      ).rejects.toBeInstanceOf(NotPermittedError);
      expect((await h.repos.verifications.findById(req.id))?.status).toBe("pending");
    });

    it("reports an unknown request as NotFound", async () => {
      await expect(h.services.verifications.approve(admin, { requestId: "verification_404" })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("rolls everything back when a write fails half-way", async () => {
      const { user, session } = await h.signUp("Ada");
      const first = await h.services.ideas.submit(session, { title: "1", description: "d" });
      const second = await h.services.ideas.submit(session, { title: "2", description: "d" });
      const req = await h.services.verifications.request(session, { claim: "Logistician" });

      const update = MemoryIdeaRepository.prototype.update;
      let calls = 0;
      vi.spyOn(MemoryIdeaRepository.prototype, "update").mockImplementation(function (this: MemoryIdeaRepository, id, patch) {
        calls += 1;
        if (calls === 2) return Promise.reject(new Error("write conflict"));
        return update.call(this, id, patch);
      });

      const err = await h.services.verifications.approve(admin, { requestId: req.id }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionFailureError);
      expect(err).toMatchObject({ kind: "TransactionFailure", message: "Transaction failed: write conflict" });
      expect((await h.repos.users.findById(user.id))?.badge).toBeNull();
      expect((await h.repos.ideas.findById(first.id))?.priority).toBe(false);
      expect((await h.repos.ideas.findById(second.id))?.priority).toBe(false);
      expect((await h.repos.verifications.findById(req.id))?.status).toBe("pending");
    });

    it("keeps a half-applied approval invisible to other readers", async () => {
      const { user, session } = await h.signUp("Ada");
      await h.services.ideas.submit(session, { title: "1", description: "d" });
      await h.services.ideas.submit(session, { title: "2", description: "d" });
      const req = await h.services.verifications.request(session, { claim: "Nurse" });

      let release = () => {};
      const gate = new Promise<void>((resolve) => {
        release = () => resolve();
      });
      let paused = () => {};
      const midway = new Promise<void>((resolve) => {
        paused = () => resolve();
      });

      const update = MemoryIdeaRepository.prototype.update;
      let calls = 0;
      vi.spyOn(MemoryIdeaRepository.prototype, "update").mockImplementation(async function (
        this: MemoryIdeaRepository,
        id,
        patch
      ) {
        calls += 1;
        if (calls === 2) {
          paused();
          await gate;
        }
        return update.call(this, id, patch);
      });

      const approval = h.services.verifications.approve(admin, { requestId: req.id });
      await midway;

      expect((await h.services.ideas.listRanked()).map((i) => i.priority)).toEqual([false, false]);
      expect((await h.repos.users.findById(user.id))?.badge).toBeNull();

      release();
      await approval;

      expect((await h.services.ideas.listRanked()).map((i) => i.priority)).toEqual([true, true]);
      expect((await h.repos.users.findById(user.id))?.badge).toBe("Nurse (Verified)");
    });
  });

  describe("reject", () => {
    it("records the decision without touching badge or priority", async () => {
      const { user, session } = await h.signUp("Ada");
      const idea = await h.services.ideas.submit(session, { title: "X", description: "d" });
      const req = await h.services.verifications.request(session, { claim: "Astronaut" });

      const rejected = await h.services.verifications.reject(admin, { requestId: req.id, adminNote: "no proof" });

      expect(rejected).toMatchObject({ status: "rejected", adminNote: "no proof" });
      expect((await h.repos.users.findById(user.id))?.badge).toBeNull();
      expect((await h.repos.ideas.findById(idea.id))?.priority).toBe(false);
    });

    it("does not revoke a badge granted earlier", async () => {
      const { user, session } = await h.signUp("Ada");
      const good = await h.services.verifications.request(session, { claim: "Nurse" });
      const later = await h.services.verifications.request(session, { claim: "Surgeon" });

      await h.services.verifications.approve(admin, { requestId: good.id });
      await h.services.verifications.reject(admin, { requestId: later.id });

      expect((await h.repos.users.findById(user.id))?.badge).toBe("Nurse (Verified)");
    });
  });

  describe("listing", () => {
    it("lists requests by status for admins only", async () => {
      const { session } = await h.signUp("Ada");
      const a = await h.services.verifications.request(session, { claim: "A" });
      const b = await h.services.verifications.request(session, { claim: "B" });
      await h.services.verifications.reject(admin, { requestId: a.id });

      expect((await h.services.verifications.listByStatus(admin, "pending")).map((r) => r.id)).toEqual([b.id]);
      expect((await h.services.verifications.listByStatus(admin, "rejected")).map((r) => r.id)).toEqual([a.id]);
      await expect(h.services.verifications.listByStatus(session, "pending")).rejects.toBeInstanceOf(
        NotPermittedError
      );
    });

    it("lists a user's own requests newest first", async () => {
      const { session } = await h.signUp("Ada");
      const a = await h.services.verifications.request(session, { claim: "A" });
      const b = await h.services.verifications.request(session, { claim: "B" });

      expect((await h.services.verifications.listMine(session)).map((r) => r.id)).toEqual([b.id, a.id]);
    });
  });
});

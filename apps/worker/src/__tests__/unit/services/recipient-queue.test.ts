import { describe, it, expect, beforeEach } from "vitest";
import { MockClock } from "../../../domain/utils/time.js";
import { LEASE_EXPIRED_REASON, RecipientQueue } from "../../../services/recipient-queue.js";
import { InMemoryRecipientRepository } from "../../../../test/in-memory-store.js";
import { START_TIME, USER_ID } from "../../../../test/helpers.js";

const OTHER_USER = "0d9c8b7a-6f5e-4d3c-8b2a-1f0e9d8c7b6a";
const LEASE_TIMEOUT_MS = 5 * 60 * 1000;

describe("RecipientQueue", () => {
  let clock: MockClock;
  let repository: InMemoryRecipientRepository;
  let queue: RecipientQueue;

  beforeEach(() => {
    clock = new MockClock(START_TIME);
    repository = new InMemoryRecipientRepository(undefined, () => clock.now());
    queue = new RecipientQueue(repository, clock);
  });

  describe("lease", () => {
    it("should lease the oldest pending recipient of the user", async () => {
      repository.add({ userId: OTHER_USER, email: "other@example.com" });
      const first = repository.add({ userId: USER_ID, email: "a@example.com", name: "Ada" });
      repository.add({ userId: USER_ID, email: "b@example.com" });

      const lease = await queue.lease(USER_ID);

      expect(lease).toMatchObject({
        id: first.id,
        email: "a@example.com",
        name: "Ada",
        attempts: 0,
        leasedAt: clock.now(),
      });
      expect(repository.get(first.id)).toMatchObject({
        status: "in_flight",
        leaseToken: lease?.leaseToken,
      });
    });

    it("should return null when nothing is pending", async () => {
      repository.add({ userId: USER_ID, email: "a@example.com", status: "sent" });
      expect(await queue.lease(USER_ID)).toBeNull();
    });

    it("should give each recipient to exactly one concurrent caller", async () => {
      const seeded = Array.from({ length: 3 }, (_, i) =>
        repository.add({ userId: USER_ID, email: `r${i}@example.com` })
      );

      const leases = await Promise.all(Array.from({ length: 5 }, () => queue.lease(USER_ID)));

      const won = leases.filter((lease) => lease !== null).map((lease) => lease?.id);
      expect(won).toHaveLength(3);
      expect(new Set(won)).toEqual(new Set(seeded.map((r) => r.id)));
      expect(leases.filter((lease) => lease === null)).toHaveLength(2);
    });

    it("should hand over scalar variables as strings and leave out the rest", async () => {
      repository.add({
        userId: USER_ID,
        email: "a@example.com",
        variables: { city: "London", age: 42, vip: true, company: null, address: { street: "Main" } },
      });

      const lease = await queue.lease(USER_ID);

      expect(lease?.variables).toEqual({ city: "London", age: "42", vip: "true" });
    });
  });

  describe("commit", () => {
    it("should mark a sent recipient and count the attempt", async () => {
      const seeded = repository.add({ userId: USER_ID, email: "a@example.com" });
      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");

      const result = await queue.commit(lease, { status: "sent", providerMessageId: "msg-1" });

      expect(result).toBe("committed");
      expect(repository.get(seeded.id)).toMatchObject({
        status: "sent",
        attempts: 1,
        providerMessageId: "msg-1",
        leaseToken: null,
        sentAt: clock.now(),
      });
    });

    it("should ignore a second commit with the same lease", async () => {
      const seeded = repository.add({ userId: USER_ID, email: "a@example.com" });
      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");

      await queue.commit(lease, { status: "sent", providerMessageId: "msg-1" });
      const second = await queue.commit(lease, {
        status: "failed",
        kind: "permanent",
        reason: "HTTP 400",
        reachedProvider: true,
      });

      expect(second).toBe("stale");
      expect(repository.get(seeded.id)).toMatchObject({ status: "sent", attempts: 1 });
    });

    it("should not count an attempt for a render failure", async () => {
      const seeded = repository.add({ userId: USER_ID, email: "a@example.com" });
      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");

      await queue.commit(lease, {
        status: "failed",
        kind: "render",
        reason: "Missing template variable(s): city",
        reachedProvider: false,
      });

      expect(repository.get(seeded.id)).toMatchObject({
        status: "failed",
        failureKind: "render",
        attempts: 0,
        lastError: "Missing template variable(s): city",
      });
    });

    it("should requeue behind recipients already waiting", async () => {
      const first = repository.add({ userId: USER_ID, email: "a@example.com" });
      const second = repository.add({ userId: USER_ID, email: "b@example.com" });

      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");
      await queue.commit(lease, { status: "requeued", reason: "HTTP 503" });

      expect(repository.get(first.id)).toMatchObject({
        status: "pending",
        attempts: 1,
        failureKind: "transient",
        lastError: "HTTP 503",
        leaseToken: null,
      });
      expect((await queue.lease(USER_ID))?.id).toBe(second.id);
    });
  });

  describe("reclaimExpiredLeases", () => {
    it("should revert leases older than the timeout and leave attempts alone", async () => {
      const stale = repository.add({
        userId: USER_ID,
        email: "a@example.com",
        status: "in_flight",
        attempts: 1,
        leaseToken: "4f1c2b3a-0000-4000-8000-000000000001",
        leasedAt: new Date(START_TIME - LEASE_TIMEOUT_MS - 1),
      });
      const fresh = repository.add({
        userId: USER_ID,
        email: "b@example.com",
        status: "in_flight",
        leaseToken: "4f1c2b3a-0000-4000-8000-000000000002",
        leasedAt: new Date(START_TIME - 1000),
      });

      const reclaimed = await queue.reclaimExpiredLeases(USER_ID, LEASE_TIMEOUT_MS);

      expect(reclaimed).toBe(1);
      expect(repository.get(stale.id)).toMatchObject({
        status: "pending",
        attempts: 1,
        leaseToken: null,
        leasedAt: null,
        failureKind: "lease_expired",
        lastError: LEASE_EXPIRED_REASON,
      });
      expect(repository.get(fresh.id)?.status).toBe("in_flight");
    });

    it("should make the late commit of a reclaimed lease stale", async () => {
      const seeded = repository.add({ userId: USER_ID, email: "a@example.com" });
      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");

      clock.advanceBy(LEASE_TIMEOUT_MS + 1);
      await queue.reclaimExpiredLeases(USER_ID, LEASE_TIMEOUT_MS);

      expect(await queue.commit(lease, { status: "sent", providerMessageId: "late" })).toBe("stale");
      expect(repository.get(seeded.id)?.status).toBe("pending");
    });
  });

  describe("retryFailed", () => {
    it("should requeue a transient failure with a fresh attempt budget", async () => {
      const seeded = repository.add({
        userId: USER_ID,
        email: "a@example.com",
        status: "failed",
        attempts: 3,
        failureKind: "transient",
      });

      expect(await queue.retryFailed(USER_ID, seeded.id)).toBe(true);
      expect(repository.get(seeded.id)).toMatchObject({ status: "pending", attempts: 0 });
    });

    it("should refuse permanent failures and other users' recipients", async () => {
      const permanent = repository.add({
        userId: USER_ID,
        email: "a@example.com",
        status: "failed",
        failureKind: "permanent",
      });
      const foreign = repository.add({
        userId: OTHER_USER,
        email: "b@example.com",
        status: "failed",
        failureKind: "transient",
      });

      expect(await queue.retryFailed(USER_ID, permanent.id)).toBe(false);
      expect(await queue.retryFailed(USER_ID, foreign.id)).toBe(false);
    });
  });

  describe("stats and recentActivity", () => {
    it("should count recipients per state", async () => {
      repository.add({ userId: USER_ID, email: "a@example.com" });
      repository.add({ userId: USER_ID, email: "b@example.com", status: "sent" });
      repository.add({ userId: USER_ID, email: "c@example.com", status: "sent" });
      repository.add({ userId: OTHER_USER, email: "d@example.com", status: "failed" });

      expect(await queue.stats(USER_ID)).toEqual({ pending: 1, in_flight: 0, sent: 2, failed: 0 });
    });

    it("should list the most recently updated recipients first", async () => {
      repository.add({ userId: USER_ID, email: "a@example.com" });
      repository.add({ userId: USER_ID, email: "b@example.com" });

      clock.advanceBy(1000);
      const lease = await queue.lease(USER_ID);
      if (!lease) throw new Error("expected a lease");
      await queue.commit(lease, { status: "sent", providerMessageId: "msg-1" });

      const activity = await queue.recentActivity(USER_ID, 1);
      expect(activity).toHaveLength(1);
      expect(activity[0]).toMatchObject({ email: "a@example.com", status: "sent", attempts: 1 });
    });
  });
});

import { describe, it, expect } from "vitest";
import { MemoryRepositories } from "../memory.repository";
import { DuplicateEmailError, NotFoundError, TransactionFailureError } from "../../domain/errors";

const newUser = (email: string) => ({
  name: "U",
  email,
  passwordHash: "digest",
  bio: "",
  isAdmin: false,
  badge: null,
});

const newIdea = () => ({
  title: "T",
  description: "D",
  tags: "",
  authorId: null,
  attachments: [],
  priority: false,
  avgRating: 0,
  upvotes: 0,
});

/** A transaction that writes, then waits until `release` is called before failing or committing. */
function heldTransaction(repos: MemoryRepositories, ideaId: string, outcome: "commit" | "fail") {
  let release = () => {};
  const gate = new Promise<void>((resolve) => {
    release = () => resolve();
  });
  let entered = () => {};
  const inside = new Promise<void>((resolve) => {
    entered = () => resolve();
  });

  const done = repos
    .transaction(async (tx) => {
      await tx.ideas.update(ideaId, { priority: true });
      entered();
      await gate;
      if (outcome === "fail") throw new Error("write conflict");
    })
    .catch((e: unknown) => e);

  return { inside, release, done };
}

describe("MemoryRepositories", () => {
  it("enforces unique emails case-insensitively", async () => {
    const repos = new MemoryRepositories();
    await repos.users.insert(newUser("a@example.test"));
    await expect(repos.users.insert(newUser(" A@Example.test "))).rejects.toBeInstanceOf(DuplicateEmailError);
    expect(await repos.users.count()).toBe(1);
  });

  it("hands out copies, not live rows", async () => {
    const repos = new MemoryRepositories();
    const user = await repos.users.insert(newUser("a@example.test"));
    user.name = "changed";
    expect((await repos.users.findById(user.id))?.name).toBe("U");
  });

  it("commits a successful transaction", async () => {
    const repos = new MemoryRepositories();
    const user = await repos.transaction((tx) => tx.users.insert(newUser("a@example.test")));
    expect(await repos.users.findById(user.id)).toEqual(user);
  });

  it("restores every write when the body throws", async () => {
    const repos = new MemoryRepositories();
    const user = await repos.users.insert(newUser("a@example.test"));

    const err = await repos
      .transaction(async (tx) => {
        await tx.users.update(user.id, { badge: "X (Verified)" });
        await tx.users.insert(newUser("b@example.test"));
        throw new Error("disk full");
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransactionFailureError);
    expect((await repos.users.findById(user.id))?.badge).toBeNull();
    expect(await repos.users.findByEmail("b@example.test")).toBeNull();
  });

  it("rethrows domain errors unchanged after rollback", async () => {
    const repos = new MemoryRepositories();
    const err = await repos
      .transaction(async (tx) => {
        await tx.users.insert(newUser("a@example.test"));
        throw new NotFoundError("Idea");
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(await repos.users.count()).toBe(0);
  });

  it("joins the running transaction from inside it", async () => {
    const repos = new MemoryRepositories();
    const err = await repos
      .transaction(async (tx) => {
        await tx.transaction((inner) => inner.users.insert(newUser("a@example.test")));
        throw new Error("outer failure");
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransactionFailureError);
    expect(await repos.users.count()).toBe(0);
  });

  it("runs concurrent transactions one after another", async () => {
    const repos = new MemoryRepositories();
    const idea = await repos.ideas.insert({
      title: "T",
      description: "D",
      tags: "",
      authorId: null,
      attachments: [],
      priority: false,
      avgRating: 0,
      upvotes: 0,
    });
    const order: string[] = [];

    await Promise.all(
      ["a", "b"].map((name) =>
        repos.transaction(async (tx) => {
          order.push(`${name}:start`);
          await tx.ideas.incrementUpvotes(idea.id);
          await new Promise((resolve) => setTimeout(resolve, 5));
          order.push(`${name}:end`);
        })
      )
    );

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect((await repos.ideas.findById(idea.id))?.upvotes).toBe(2);
  });

  it("keeps a write made while a transaction was open when that transaction rolls back", async () => {
    const repos = new MemoryRepositories();
    const idea = await repos.ideas.insert(newIdea());
    const held = heldTransaction(repos, idea.id, "fail");

    await held.inside;
    const vote = repos.ideas.incrementUpvotes(idea.id);
    held.release();

    expect(await held.done).toBeInstanceOf(TransactionFailureError);
    expect((await vote)?.upvotes).toBe(1);
    expect(await repos.ideas.findById(idea.id)).toMatchObject({ upvotes: 1, priority: false });
  });

  it("keeps a write made while a transaction was open when that transaction commits", async () => {
    const repos = new MemoryRepositories();
    const idea = await repos.ideas.insert(newIdea());
    const held = heldTransaction(repos, idea.id, "commit");

    await held.inside;
    const vote = repos.ideas.incrementUpvotes(idea.id);
    held.release();

    expect(await held.done).toBeUndefined();
    await vote;
    expect(await repos.ideas.findById(idea.id)).toMatchObject({ upvotes: 1, priority: true });
  });

  it("hides a transaction's writes from outside readers until it commits", async () => {
    const repos = new MemoryRepositories();
    const idea = await repos.ideas.insert(newIdea());
    const held = heldTransaction(repos, idea.id, "commit");

    await held.inside;
    expect((await repos.ideas.findById(idea.id))?.priority).toBe(false);
    expect((await repos.ideas.list()).map((i) => i.priority)).toEqual([false]);

    held.release();
    await held.done;
    expect((await repos.ideas.findById(idea.id))?.priority).toBe(true);
  });

  it("detaches authors and reviewers", async () => {
    const repos = new MemoryRepositories();
    const idea = await repos.ideas.insert({
      title: "T",
      description: "D",
      tags: "",
      authorId: "user_9",
      attachments: [],
      priority: false,
      avgRating: 0,
      upvotes: 0,
    });
    await repos.reviews.insert({ ideaId: idea.id, reviewerId: "user_9", rating: 4, comment: "" });

    expect(await repos.ideas.detachAuthor("user_9")).toBe(1);
    expect(await repos.reviews.detachReviewer("user_9")).toBe(1);
    expect(await repos.ideas.listByAuthor("user_9")).toEqual([]);
    expect((await repos.reviews.listByIdea(idea.id))[0].reviewerId).toBeNull();
  });
});

import { describe, it, expect, vi, beforeEach } from "vitest";
import { createPostgresStore } from "../../src/store/postgres.js";

const { mockQuery, mockEnd, poolOptions } = vi.hoisted(() => {
  const poolOptions: unknown[] = [];
  return { mockQuery: vi.fn(), mockEnd: vi.fn(), poolOptions };
});

vi.mock("pg", () => ({
  default: {
    Pool: class {
      query = mockQuery;
      end = mockEnd;
      on = vi.fn();
      constructor(options: unknown) {
        poolOptions.push(options);
      }
    },
  },
}));

vi.mock("@actions/core", () => ({
  warning: vi.fn(),
}));

function row(id: string, title: string | null) {
  return { id, title, company: "美团", location: null, url: `https://www.lagou.com/jobs/${id}.html` };
}

describe("PostgresPostingStore", () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockEnd.mockReset();
    poolOptions.length = 0;
  });

  it("configures the pool with the query timeout", () => {
    createPostgresStore("postgres://localhost/test", { queryTimeoutMs: 5000 });

    expect(poolOptions).toEqual([
      {
        connectionString: "postgres://localhost/test",
        max: 2,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5000,
        query_timeout: 5000,
      },
    ]);
  });

  it("reads the first page from the lowest id", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [row("3", "后端"), row("8", null)] });
    const store = createPostgresStore("postgres://localhost/test", { queryTimeoutMs: 5000 });

    const page = await store.fetchPage(undefined, 2);

    expect(mockQuery.mock.calls[0][1]).toEqual(["0", 2]);
    expect(page.records).toEqual([
      { title: "后端", company: "美团", location: undefined, url: "https://www.lagou.com/jobs/3.html" },
      { title: undefined, company: "美团", location: undefined, url: "https://www.lagou.com/jobs/8.html" },
    ]);
    expect(page.nextCursor).toBe("8");
  });

  it("stops on a short page", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [row("12", "算法")] });
    const store = createPostgresStore("postgres://localhost/test", { queryTimeoutMs: 5000 });

    const page = await store.fetchPage("8", 2);

    expect(mockQuery.mock.calls[0][1]).toEqual(["8", 2]);
    expect(page.nextCursor).toBeUndefined();
  });

  it("closes the pool", async () => {
    mockEnd.mockResolvedValueOnce(undefined);
    const store = createPostgresStore("postgres://localhost/test", { queryTimeoutMs: 5000 });

    await store.close();

    expect(mockEnd).toHaveBeenCalledOnce();
  });
});

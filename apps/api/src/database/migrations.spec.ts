import { applyMigrations, Migration, readMigrations } from "./migrations";

describe("readMigrations", () => {
  it("loads the bundled schema scripts in name order", () => {
    const migrations = readMigrations();

    expect(migrations.map((m) => m.name)).toEqual(["001_init.sql"]);
    expect(migrations[0].sql).toContain("CREATE UNIQUE INDEX IF NOT EXISTS shifts_one_open_per_admin");
  });
});

describe("applyMigrations", () => {
  const migrations: Migration[] = [
    { name: "001_init.sql", sql: "CREATE TABLE a (id int);" },
    { name: "002_more.sql", sql: "CREATE TABLE b (id int);" },
  ];

  it("runs every script inside one transaction", async () => {
    const runner = { query: jest.fn().mockResolvedValue(undefined) };

    const applied = await applyMigrations(runner, migrations);

    expect(applied).toEqual(["001_init.sql", "002_more.sql"]);
    expect(runner.query.mock.calls.map(([text]) => text)).toEqual([
      "BEGIN",
      "CREATE TABLE a (id int);",
      "CREATE TABLE b (id int);",
      "COMMIT",
    ]);
  });

  it("rolls back and rethrows when a script fails", async () => {
    const runner = {
      query: jest.fn((text: string) =>
        text.startsWith("CREATE TABLE b")
          ? Promise.reject(new Error("relation already exists"))
          : Promise.resolve(undefined),
      ),
    };

    await expect(applyMigrations(runner, migrations)).rejects.toThrow("relation already exists");
    expect(runner.query).toHaveBeenLastCalledWith("ROLLBACK");
  });
});

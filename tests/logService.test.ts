import { describe, expect, it, vi } from "vitest";
import { LogService } from "../src/log/logService";

describe("LogService", () => {
  it("добавляет записи и вызывает onEntry", () => {
    const onEntry = vi.fn();
    const log = new LogService(200, onEntry, () => 1000);

    log.info("i", { a: 1 });
    log.warn("w");
    log.error("e");

    const items = log.list();
    expect(items.map((x) => x.level)).toEqual(["info", "warn", "error"]);
    expect(items[0]).toEqual({ ts: 1000, level: "info", message: "i", data: { a: 1 } });
    expect(items[1].data).toBeUndefined();
    expect(onEntry).toHaveBeenCalledTimes(3);
  });

  it("гарантирует минимум 10 записей и setMaxEntries делает trim и emit", () => {
    const log = new LogService(1);
    for (let i = 0; i < 50; i++) log.info(String(i));
    expect(log.list()).toHaveLength(10);
    expect(log.list()[0].message).toBe("40");

    const cb = vi.fn();
    log.onChange(cb);
    log.setMaxEntries(5);
    expect(cb).toHaveBeenCalledTimes(1);
    expect(log.list()).toHaveLength(10);
  });

  it("onChange вызывается при добавлении и clear; отписка работает", () => {
    const log = new LogService(200);
    const cb = vi.fn();
    const unsub = log.onChange(cb);

    log.info("x");
    log.clear();
    expect(cb).toHaveBeenCalledTimes(2);
    expect(log.list()).toEqual([]);

    unsub();
    log.info("y");
    expect(cb).toHaveBeenCalledTimes(2);
  });

  it("scoped: добавляет префикс и объединяет fixed + data", () => {
    const log = new LogService(200);
    log.scoped("Сетка", { day: "2024-01-15", rows: 0 }).info("построена", { rows: 33 });

    const e = log.list()[0];
    expect(e.message).toBe("Сетка: построена");
    expect(e.data).toEqual({ day: "2024-01-15", rows: 33 });
  });

  it("scoped: без fixed/data оставляет data undefined, пустой scope: без префикса", () => {
    const log = new LogService(200);
    log.scoped("Модуль").warn("ok");
    log.scoped("").error("plain");
    const [a, b] = log.list();
    expect(a.message).toBe("Модуль: ok");
    expect(a.data).toBeUndefined();
    expect(b.message).toBe("plain");
  });

  it("Date → ISO, Error → объект", () => {
    const log = new LogService(200);
    const e = new Error("boom", { cause: "disk" });
    log.error("x", { at: new Date(Date.UTC(2024, 0, 15, 9, 0)), bad: new Date(Number.NaN), e });

    const data = log.list()[0].data;
    expect(data?.at).toBe("2024-01-15T09:00:00.000Z");
    expect(data?.bad).toBe("Invalid Date");
    expect(data?.e).toMatchObject({ name: "Error", message: "boom", cause: "disk" });
  });

  it("обрезает длинные строки, массивы и объекты", () => {
    const log = new LogService(200);
    const bigObj: Record<string, unknown> = {};
    for (let i = 0; i < 205; i++) bigObj[`k${i}`] = i;
    log.info("x".repeat(5000), { arr: Array.from({ length: 205 }, (_, i) => i), bigObj });

    const e = log.list()[0];
    expect(e.message).toBe("x".repeat(4000) + "...[truncated]");
    const arr = e.data?.arr;
    expect(Array.isArray(arr) ? arr.length : 0).toBe(201);
    expect(Array.isArray(arr) ? arr[200] : undefined).toBe("[truncated]");
    expect(e.data?.bigObj).toMatchObject({ k0: 0, "[truncated]": "5 keys" });
  });

  it("глубокая вложенность обрезается", () => {
    const log = new LogService(200);
    let deep: Record<string, unknown> = { leaf: true };
    for (let i = 0; i < 10; i++) deep = { inner: deep };
    log.info("x", { deep });
    expect(JSON.stringify(log.list()[0].data)).toContain('"[truncated]"');
  });
});

import assert from "node:assert/strict";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { after, before, test } from "node:test";

import { RecordStore } from "../src/record_store.ts";
import { flatRecord, makeTempDir, silentLogger } from "./helpers.ts";

let dir = "";
let cleanup = async () => {};

before(async () => {
  ({ dir, cleanup } = await makeTempDir());
});

after(async () => {
  await cleanup();
});

test("loadAll on a missing file is an empty store", async () => {
  const store = new RecordStore(join(dir, "missing.txt"), silentLogger());

  const loaded = await store.loadAll();

  assert.deepEqual(loaded, { ok: true, value: [] });
});

test("loadAll skips blank and malformed lines", async () => {
  // Arrange: two good lines around a blank and a broken one
  const path = join(dir, "mixed.txt");
  await writeFile(path, "1|Ann|50.00|60.00|70.00\n\ngarbage\n2|Ben|10.00|20.00|30.00\n");
  const store = new RecordStore(path, silentLogger());

  // Act
  const loaded = await store.loadAll();

  // Assert
  assert.ok(loaded.ok);
  if (loaded.ok) {
    assert.deepEqual(loaded.value.map((record) => record.id), [1, 2]);
    assert.equal(loaded.value[1].total, 60);
  }
});

test("append adds lines in order and creates the parent directory", async () => {
  const path = join(dir, "nested", "students.txt");
  const store = new RecordStore(path, silentLogger());

  await store.append(flatRecord(3, "Cid", 70));
  await store.append(flatRecord(1, "Ann", 40));

  assert.equal(await readFile(path, "utf8"), "3|Cid|70.00|70.00|70.00\n1|Ann|40.00|40.00|40.00\n");
});

test("exists reports whether an id is present", async () => {
  const store = new RecordStore(join(dir, "exists.txt"), silentLogger());
  await store.append(flatRecord(5, "Eve", 50));

  assert.deepEqual(await store.exists(5), { ok: true, value: true });
  assert.deepEqual(await store.exists(6), { ok: true, value: false });
});

test("overwriteAll replaces the content and leaves no temporary file", async () => {
  // Arrange
  const sub = join(dir, "overwrite");
  await mkdir(sub);
  const path = join(sub, "students.txt");
  const store = new RecordStore(path, silentLogger());
  await store.append(flatRecord(1, "Ann", 40));

  // Act
  const written = await store.overwriteAll([flatRecord(9, "Ivy", 90), flatRecord(8, "Hal", 80)]);

  // Assert
  assert.equal(written.ok, true);
  assert.equal(await readFile(path, "utf8"), "9|Ivy|90.00|90.00|90.00\n8|Hal|80.00|80.00|80.00\n");
  assert.deepEqual(await readdir(sub), ["students.txt"]);
});

test("clear keeps an empty file", async () => {
  const path = join(dir, "clear.txt");
  const store = new RecordStore(path, silentLogger());
  await store.append(flatRecord(1, "Ann", 40));

  const cleared = await store.clear();

  assert.equal(cleared.ok, true);
  assert.equal(await readFile(path, "utf8"), "");
  assert.deepEqual(await store.loadAll(), { ok: true, value: [] });
});

test("loadAll reports an IOError when the path is a directory", async () => {
  const path = join(dir, "a-directory");
  await mkdir(path);
  const store = new RecordStore(path, silentLogger());

  const loaded = await store.loadAll();

  assert.equal(loaded.ok, false);
  if (!loaded.ok) assert.equal(loaded.error.kind, "IOError");
});

test("a rewrite stores invalid UTF-8 bytes as the replacement character", async () => {
  // Arrange: byte 0xff inside a name
  const path = join(dir, "latin.txt");
  await writeFile(path, Buffer.concat([Buffer.from("1|Ren"), Buffer.from([0xff]), Buffer.from("|40.00|40.00|40.00\n")]));
  const store = new RecordStore(path, silentLogger());

  // Act
  const loaded = await store.loadAll();
  assert.ok(loaded.ok);
  if (!loaded.ok) return;
  await store.overwriteAll(loaded.value);

  // Assert
  assert.equal(loaded.value[0].name, "Ren\uFFFD");
  assert.equal(await readFile(path, "utf8"), "1|Ren\uFFFD|40.00|40.00|40.00\n");
});

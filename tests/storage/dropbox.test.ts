import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { DropboxStorageProvider, dropboxApiArg } from "../../src/storage/dropbox";
import { RemoteProtocolError } from "../../src/utils/errors";
import { FakeHttp, jsonResponse, makeTempDir, type RecordedRequest, removeTempDir } from "../helpers";

function dropbox(handler: (request: RecordedRequest) => Response, rootPath?: string) {
  const http = new FakeHttp(handler);
  const provider = new DropboxStorageProvider({ accessToken: "test-token", rootPath, http: http.fetch });
  return { http, provider };
}

describe("DropboxStorageProvider", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("dropbox");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  test("dropboxApiArg escapes non-ASCII characters", () => {
    expect(dropboxApiArg({ path: "/backups/café.tar.zst" })).toBe('{"path":"/backups/caf\\u00e9.tar.zst"}');
  });

  describe("list", () => {
    test("collects every page and keeps files only", async () => {
      const { http, provider } = dropbox((request) => {
        if (request.url.endsWith("/files/list_folder")) {
          return jsonResponse({
            entries: [
              { ".tag": "file", name: "a.tar.zst", size: 10, server_modified: "2024-01-01T00:00:00Z" },
              { ".tag": "folder", name: "old" },
            ],
            has_more: true,
            cursor: "cursor-1",
          });
        }
        return jsonResponse({ entries: [{ ".tag": "file", name: "b.tar.zst", size: 20 }], has_more: false });
      });

      expect(await provider.list("backups/")).toEqual([
        { key: "backups/a.tar.zst", size: 10, lastModified: new Date("2024-01-01T00:00:00Z") },
        { key: "backups/b.tar.zst", size: 20, lastModified: undefined },
      ]);

      expect(http.requests.map((r) => [r.url, r.body])).toEqual([
        ["https://api.dropboxapi.com/2/files/list_folder", '{"path":"/backups","recursive":false}'],
        ["https://api.dropboxapi.com/2/files/list_folder/continue", '{"cursor":"cursor-1"}'],
      ]);
      expect(http.requests[0]?.headers.get("authorization")).toBe("Bearer test-token");
    });

    test("places keys under the configured root", async () => {
      const { http, provider } = dropbox(() => jsonResponse({ entries: [], has_more: false }), "/packrat");
      await provider.list("backups/");
      expect(http.requests[0]?.body).toBe('{"path":"/packrat/backups","recursive":false}');
    });

    test("a missing folder lists nothing", async () => {
      const { provider } = dropbox(() =>
        jsonResponse({ error_summary: "path/not_found/.", error: { ".tag": "path" } }, 409),
      );
      expect(await provider.list("backups/")).toEqual([]);
    });

    test("other conflicts are errors", async () => {
      const { provider } = dropbox(() => jsonResponse({ error_summary: "path/malformed_path/." }, 409));

      const attempt = provider.list("backups/");
      await expect(attempt).rejects.toBeInstanceOf(RemoteProtocolError);
      await expect(attempt).rejects.toThrow("dropbox: list_folder backups/ failed: path/malformed_path/.");
    });
  });

  test("upload commits with overwrite mode", async () => {
    const file = path.join(tempDir, "x.tar.zst");
    await writeFile(file, "0123456789");
    const { http, provider } = dropbox(() => jsonResponse({ name: "x.tar.zst" }));

    await provider.upload("backups/x.tar.zst", file);

    const [request] = http.requests;
    expect(request?.url).toBe("https://content.dropboxapi.com/2/files/upload");
    expect(request?.headers.get("dropbox-api-arg")).toBe(
      '{"path":"/backups/x.tar.zst","mode":"overwrite","autorename":false,"mute":true}',
    );
    expect(request?.headers.get("content-type")).toBe("application/octet-stream");
  });

  test("download streams the body to disk", async () => {
    const { http, provider } = dropbox(() => new Response("archive bytes"));
    const target = path.join(tempDir, "out", "a.tar.zst");

    await provider.download("backups/a.tar.zst", target);

    expect(await readFile(target, "utf8")).toBe("archive bytes");
    expect(http.requests[0]?.headers.get("dropbox-api-arg")).toBe('{"path":"/backups/a.tar.zst"}');
  });

  test("delete calls delete_v2 with the full path", async () => {
    const { http, provider } = dropbox(() => jsonResponse({ metadata: {} }));
    await provider.delete("backups/a.tar.zst");
    expect(http.requests.map((r) => [r.url, r.body])).toEqual([
      ["https://api.dropboxapi.com/2/files/delete_v2", '{"path":"/backups/a.tar.zst"}'],
    ]);
  });

  test("surfaces HTTP failures with their status", async () => {
    const { provider } = dropbox(() => new Response("expired token", { status: 401 }));
    await expect(provider.delete("backups/a.tar.zst")).rejects.toMatchObject({
      status: 401,
      message: "dropbox: POST api.dropboxapi.com/2/files/delete_v2 returned 401: expired token",
    });
  });
});

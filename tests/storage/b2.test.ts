import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { B2_AUTHORIZE_URL, B2StorageProvider, encodeB2FileName } from "../../src/storage/b2";
import { FakeHttp, jsonResponse, makeTempDir, type RecordedRequest, removeTempDir } from "../helpers";

const SESSION = {
  apiUrl: "https://api.b2.test",
  downloadUrl: "https://f000.b2.test",
  authorizationToken: "session-token",
};

type Route = (request: RecordedRequest) => Response | undefined;

function b2(route: Route) {
  const http = new FakeHttp((request) => {
    if (request.url === B2_AUTHORIZE_URL) return jsonResponse(SESSION);
    return route(request) ?? new Response("unexpected request", { status: 500 });
  });
  const provider = new B2StorageProvider({
    accountId: "test-account",
    applicationKey: "test-secret",
    bucketId: "bucket-id",
    bucketName: "test-bucket",
    http: http.fetch,
  });
  return { http, provider };
}

function operation(request: RecordedRequest): string {
  return request.url.replace(`${SESSION.apiUrl}/b2api/v2/`, "");
}

describe("B2StorageProvider", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("b2");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  test("encodeB2FileName keeps slashes", () => {
    expect(encodeB2FileName("backups/a b+c.tar.zst")).toBe("backups/a%20b%2Bc.tar.zst");
  });

  test("list pages through file names and authorizes once", async () => {
    const { http, provider } = b2((request) => {
      if (operation(request) !== "b2_list_file_names") return undefined;
      if (!request.body?.includes("startFileName")) {
        return jsonResponse({
          files: [{ fileName: "backups/a.tar.zst", contentLength: 10, uploadTimestamp: 1704067200000 }],
          nextFileName: "backups/b.tar.zst",
        });
      }
      return jsonResponse({
        files: [{ fileName: "backups/b.tar.zst", contentLength: 20, uploadTimestamp: 1704153600000 }],
        nextFileName: null,
      });
    });

    expect(await provider.list("backups/")).toEqual([
      { key: "backups/a.tar.zst", size: 10, lastModified: new Date("2024-01-01T00:00:00Z") },
      { key: "backups/b.tar.zst", size: 20, lastModified: new Date("2024-01-02T00:00:00Z") },
    ]);

    const [authorize, first, second] = http.requests;
    expect(authorize?.headers.get("authorization")).toBe(
      `Basic ${Buffer.from("test-account:test-secret").toString("base64")}`,
    );
    expect(first?.body).toBe('{"bucketId":"bucket-id","prefix":"backups/","maxFileCount":1000}');
    expect(second?.body).toBe(
      '{"bucketId":"bucket-id","prefix":"backups/","maxFileCount":1000,"startFileName":"backups/b.tar.zst"}',
    );
    expect(second?.headers.get("authorization")).toBe("session-token");
    expect(http.requests.filter((r) => r.url === B2_AUTHORIZE_URL)).toHaveLength(1);
  });

  test("upload sends the sha1 and the encoded name", async () => {
    const file = path.join(tempDir, "hello.tar.zst");
    await writeFile(file, "hello");
    const { http, provider } = b2((request) => {
      if (operation(request) === "b2_get_upload_url") {
        return jsonResponse({ uploadUrl: "https://pod.b2.test/upload", authorizationToken: "upload-token" });
      }
      if (request.url === "https://pod.b2.test/upload") return jsonResponse({ fileId: "f1" });
      return undefined;
    });

    await provider.upload("backups/my backup.tar.zst", file);

    const upload = http.requests.find((r) => r.url === "https://pod.b2.test/upload");
    expect(upload?.headers.get("authorization")).toBe("upload-token");
    expect(upload?.headers.get("x-bz-file-name")).toBe("backups/my%20backup.tar.zst");
    expect(upload?.headers.get("x-bz-content-sha1")).toBe("aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d");
    expect(upload?.headers.get("content-length")).toBe("5");
  });

  describe("delete", () => {
    test("deletes the version whose name matches exactly", async () => {
      const { http, provider } = b2((request) => {
        if (operation(request) === "b2_list_file_versions") {
          return jsonResponse({ files: [{ fileName: "backups/a.tar.zst", fileId: "file-1" }] });
        }
        if (operation(request) === "b2_delete_file_version") return jsonResponse({});
        return undefined;
      });

      await provider.delete("backups/a.tar.zst");

      const deletion = http.requests.find((r) => operation(r) === "b2_delete_file_version");
      expect(deletion?.body).toBe('{"fileId":"file-1","fileName":"backups/a.tar.zst"}');
    });

    test("leaves a neighbouring name alone", async () => {
      const { http, provider } = b2((request) => {
        if (operation(request) === "b2_list_file_versions") {
          return jsonResponse({ files: [{ fileName: "backups/a.tar.zst.old", fileId: "file-2" }] });
        }
        return undefined;
      });

      await provider.delete("backups/a.tar.zst");

      expect(http.requests.some((r) => operation(r) === "b2_delete_file_version")).toBe(false);
    });
  });

  test("retries authorization after a failure", async () => {
    let attempts = 0;
    const http = new FakeHttp((request) => {
      if (request.url === B2_AUTHORIZE_URL) {
        attempts++;
        return attempts === 1 ? new Response("bad key", { status: 401 }) : jsonResponse(SESSION);
      }
      return jsonResponse({ files: [] });
    });
    const provider = new B2StorageProvider({
      accountId: "test-account",
      applicationKey: "test-secret",
      bucketId: "bucket-id",
      bucketName: "test-bucket",
      http: http.fetch,
    });

    await expect(provider.list("backups/")).rejects.toMatchObject({ status: 401 });
    expect(await provider.list("backups/")).toEqual([]);
    expect(attempts).toBe(2);
  });
});

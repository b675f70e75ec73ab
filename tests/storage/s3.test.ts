import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import {
  DeleteObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { mockClient } from "aws-sdk-client-mock";
import { afterAll, beforeAll, beforeEach, describe, expect, test } from "vitest";
import { S3StorageProvider } from "../../src/storage/s3";
import { RemoteProtocolError } from "../../src/utils/errors";
import { makeTempDir, removeTempDir } from "../helpers";

describe("S3StorageProvider", () => {
  const s3Mock = mockClient(S3Client);
  let tempDir: string;

  const provider = new S3StorageProvider({
    bucket: "test-bucket",
    region: "us-east-1",
    accessKeyId: "test-access",
    secretAccessKey: "test-secret",
  });

  beforeAll(async () => {
    tempDir = await makeTempDir("s3");
  });

  afterAll(async () => {
    s3Mock.restore();
    await removeTempDir(tempDir);
  });

  beforeEach(() => {
    s3Mock.reset();
  });

  test("upload sends the file with its length", async () => {
    const file = path.join(tempDir, "x.tar.zst");
    await writeFile(file, "0123456789");
    s3Mock.on(PutObjectCommand).resolves({});

    await provider.upload("backups/x.tar.zst", file);

    const [call] = s3Mock.commandCalls(PutObjectCommand);
    expect(call?.args[0].input).toMatchObject({
      Bucket: "test-bucket",
      Key: "backups/x.tar.zst",
      ContentLength: 10,
    });
  });

  test("list follows continuation tokens", async () => {
    const modified = new Date("2024-01-01T00:00:00Z");
    s3Mock
      .on(ListObjectsV2Command)
      .resolvesOnce({
        Contents: [{ Key: "backups/a.tar.zst", Size: 10, LastModified: modified }],
        IsTruncated: true,
        NextContinuationToken: "page-2",
      })
      .resolvesOnce({
        Contents: [{ Key: "backups/b.tar.zst", Size: 20 }],
        IsTruncated: false,
      });

    const items = await provider.list("backups/");

    expect(items).toEqual([
      { key: "backups/a.tar.zst", size: 10, lastModified: modified },
      { key: "backups/b.tar.zst", size: 20, lastModified: undefined },
    ]);
    const calls = s3Mock.commandCalls(ListObjectsV2Command);
    expect(calls.map((c) => c.args[0].input.ContinuationToken)).toEqual([undefined, "page-2"]);
    expect(calls[0]?.args[0].input.Prefix).toBe("backups/");
  });

  test("an empty bucket lists nothing", async () => {
    s3Mock.on(ListObjectsV2Command).resolves({ IsTruncated: false });
    expect(await provider.list("backups/")).toEqual([]);
  });

  test("wraps service errors with the HTTP status", async () => {
    s3Mock.on(DeleteObjectCommand).rejects(
      new S3ServiceException({
        name: "AccessDenied",
        $fault: "client",
        $metadata: { httpStatusCode: 403 },
        message: "Access Denied",
      }),
    );

    const attempt = provider.delete("backups/a.tar.zst");
    await expect(attempt).rejects.toBeInstanceOf(RemoteProtocolError);
    await expect(attempt).rejects.toMatchObject({
      message: "s3: DeleteObject s3://test-bucket/backups/a.tar.zst failed",
      status: 403,
    });
  });
});

import fs from "fs";
import os from "os";
import path from "path";
import { MockAgent } from "undici";
import { UploadFailedError } from "../src/errors";
import { HttpObjectUploader } from "../src/upload";

const ORIGIN = "https://uploads.test";

let work: string;
let file: string;
let agent: MockAgent;

beforeEach(() => {
  work = fs.mkdtempSync(path.join(os.tmpdir(), "upload-"));
  file = path.join(work, "artifacts.zip");
  fs.writeFileSync(file, "zip-bytes");
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
  fs.rmSync(work, { recursive: true, force: true });
});

describe("HttpObjectUploader.put", () => {
  test("succeeds on 2xx", async () => {
    agent.get(ORIGIN).intercept({ path: "/app123/1", method: "PUT" }).reply(200, "");

    await new HttpObjectUploader({ dispatcher: agent }).put(`${ORIGIN}/app123/1`, file);

    agent.assertNoPendingInterceptors();
  });

  test("a non-2xx status is an upload failure", async () => {
    agent.get(ORIGIN).intercept({ path: "/app123/1", method: "PUT" }).reply(403, "AccessDenied");

    const failure = new HttpObjectUploader({ dispatcher: agent }).put(`${ORIGIN}/app123/1`, file);

    await expect(failure).rejects.toBeInstanceOf(UploadFailedError);
    await expect(failure).rejects.toMatchObject({
      status: 403,
      message: "Error uploading file: HTTP 403 :: AccessDenied",
    });
  });

  test("a transport error is an upload failure without status", async () => {
    agent.get(ORIGIN).intercept({ path: "/app123/1", method: "PUT" }).replyWithError(new Error("socket hang up"));

    const failure = new HttpObjectUploader({ dispatcher: agent }).put(`${ORIGIN}/app123/1`, file);

    await expect(failure).rejects.toBeInstanceOf(UploadFailedError);
    await expect(failure).rejects.toMatchObject({ status: undefined, code: "UPLOAD_FAILED" });
  });
});

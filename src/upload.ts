import fs from "fs";
import { request, type Dispatcher } from "undici";
import { UploadFailedError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { IObjectUploader } from "./services/deploy/deploy.interface";

// A failed PUT is final: pre-signed URLs are single use.
export class HttpObjectUploader implements IObjectUploader {
  private dispatcher?: Dispatcher;

  constructor(opts?: { dispatcher?: Dispatcher }) {
    this.dispatcher = opts?.dispatcher;
  }

  async put(url: string, filePath: string): Promise<void> {
    const body = fs.readFileSync(filePath);
    const log = createLogger({ service: "HttpObjectUploader", file: filePath, bytes: body.length });
    log.debug("Uploading artifact");

    const res = await request(url, {
      method: "PUT",
      headers: { "content-type": "application/zip", "content-length": String(body.length) },
      body,
      dispatcher: this.dispatcher,
    }).catch((e: unknown) => {
      throw new UploadFailedError(undefined, errorMessage(e), { cause: e });
    });

    const raw = await res.body.text();
    if (res.statusCode < 200 || res.statusCode >= 300) {
      log.error({ status: res.statusCode }, "Upload rejected");
      throw new UploadFailedError(res.statusCode, raw);
    }
    log.info({ status: res.statusCode }, "Uploaded artifact");
  }
}

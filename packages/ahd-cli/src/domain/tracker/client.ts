import { HttpSession } from "../http/session.js";
import type { SubmissionResponse, UploadForm } from "../types.js";

export interface AhdClient {
  submitUploadForm(form: UploadForm): Promise<SubmissionResponse>;
}

export interface AhdClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  cookie: string;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_BASE_URL = "https://awesome-hd.me";
export const UPLOAD_PATH = "/upload.php";

export function createAhdClient(options: AhdClientOptions): AhdClient {
  const session = new HttpSession({
    baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
    timeoutMs: options.timeoutMs ?? 60_000,
    label: "tracker",
    fetchImpl: options.fetchImpl,
    cookie: options.cookie,
  });

  return {
    async submitUploadForm(form) {
      const requestUrl = session.resolve(UPLOAD_PATH).toString();
      const response = await session.fetch({
        pathOrUrl: requestUrl,
        method: "POST",
        body: toMultipart(form),
        includeAuthCookie: true,
        redirect: "follow",
      });

      return {
        status: response.status,
        url: response.url.length > 0 ? response.url : requestUrl,
        html: await response.text(),
      };
    },
  };
}

export function toMultipart(form: UploadForm): FormData {
  const body = new FormData();
  for (const [name, field] of Object.entries(form)) {
    if (field.kind === "text") {
      body.append(name, field.value);
    } else {
      body.append(name, new Blob([field.content]), field.fileName);
    }
  }
  return body;
}

/** Client that records submissions and answers each with the same canned response. */
export function createMockAhdClient(
  response: SubmissionResponse,
): AhdClient & { submissions: UploadForm[] } {
  const submissions: UploadForm[] = [];
  return {
    submissions,
    async submitUploadForm(form) {
      submissions.push(form);
      return response;
    },
  };
}

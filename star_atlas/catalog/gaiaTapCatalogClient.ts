import type { ResultSet } from "../../astro/schemas/catalogRow.schema.js";
import { CatalogUnavailableError, QuerySyntaxError } from "../errors.js";
import type { CatalogQuery } from "../query/buildCatalogQuery.js";
import { rowsFromTapJson } from "./parseTapJson.js";
import type { CatalogClient } from "./types.js";

export type GaiaTapConfig = {
  /** Service root, e.g. https://gea.esac.esa.int/tap-server/tap */
  tapUrl: string;
  timeoutMs: number;
};

/**
 * Pull the error text out of a TAP VOTable error document:
 *   <INFO name="QUERY_STATUS" value="ERROR">message</INFO>
 */
export function extractTapErrorMessage(body: string): string {
  const match = /<INFO[^>]*value="ERROR"[^>]*>([\s\S]*?)<\/INFO>/i.exec(body);
  const text = (match ? match[1] : body).replace(/\s+/g, " ").trim();
  return text.slice(0, 500) || "no details";
}

/**
 * Synchronous ADQL queries against a TAP service (Gaia archive by default).
 * One POST per query; no retries.
 */
export class GaiaTapCatalogClient implements CatalogClient {
  name = "gaia-tap";

  constructor(private readonly config: GaiaTapConfig) {}

  async fetchRows(query: CatalogQuery): Promise<ResultSet> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    // The deadline covers the whole exchange, body included.
    try {
      return await this.runQuery(query, controller.signal);
    } finally {
      clearTimeout(timeout);
    }
  }

  private timedOut(status?: number): CatalogUnavailableError {
    return new CatalogUnavailableError(this.name, `timed out after ${this.config.timeoutMs} ms`, status);
  }

  private async runQuery(query: CatalogQuery, signal: AbortSignal): Promise<ResultSet> {
    const url = `${this.config.tapUrl}/sync`;
    const body = new URLSearchParams({
      REQUEST: "doQuery",
      LANG: "ADQL",
      FORMAT: "json",
      QUERY: query.adql,
    });

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        signal,
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body,
      });
    } catch (err) {
      if (signal.aborted) throw this.timedOut();
      throw new CatalogUnavailableError(this.name, err instanceof Error ? err.message : String(err));
    }

    let text: string;
    try {
      text = await untilAborted(res.text(), signal);
    } catch (err) {
      if (signal.aborted) throw this.timedOut(res.status);
      if (res.ok) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new CatalogUnavailableError(this.name, `cannot read response: ${detail}`, res.status);
      }
      text = "";
    }

    if (res.status === 400) {
      throw new QuerySyntaxError(query.adql, extractTapErrorMessage(text));
    }

    if (!res.ok) {
      throw new CatalogUnavailableError(
        this.name,
        `HTTP ${res.status}: ${extractTapErrorMessage(text)}`,
        res.status
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new CatalogUnavailableError(this.name, "response body is not JSON", res.status);
    }

    const parsed = rowsFromTapJson(payload);
    if (!parsed.ok) {
      throw new CatalogUnavailableError(this.name, parsed.reason, res.status);
    }

    return parsed.rows;
  }
}

/**
 * Settle with `work`, or reject as soon as the signal aborts. A body read on
 * a Response that ignores the signal would otherwise wait forever.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

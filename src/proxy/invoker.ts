// proxy_tool_call execution: payment header injection -> resolve -> HTTP -> MCP result
//
// Per call: Idle -> PaymentEncoding (when a credential is attached) -> Resolving
//   -> Requesting -> ResponseTranslating -> result
// Caller mistakes end as error-flagged results. Network failures and
// cancellation are thrown. Nothing is retried here; paying and resubmitting
// is the agent's job.

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { DiscoveryResource, JsonObject, PaymentHeader } from "../types/x402.js";
import { PAYMENT_RESPONSE_META_KEY } from "../types/x402.js";
import { isObject } from "../types/guards.js";
import {
  decodePaymentRequired,
  decodePaymentResponse,
  encodePaymentHeader,
  parsePaymentCredential,
} from "../payment/codec.js";
import { isHttpResource, toolNameFor } from "../tools/synthesize.js";
import {
  CancelledError,
  EncodeError,
  NotFoundError,
  PaymentMetaError,
  UpstreamError,
  ValidationError,
} from "../errors.js";
import {
  buildProxyRequest,
  headersToRecord,
  MAX_PROXY_RESPONSE_BYTES,
  PROXY_TIMEOUT_MS,
  readBoundedText,
  type ProxyRequest,
} from "./http.js";

export interface ProxyCall {
  toolName: string | undefined;
  parameters?: JsonObject;
  /** Raw _meta["x402/payment"] value from the tool call */
  payment?: unknown;
  signal?: AbortSignal;
}

export interface ProxyInvokerOptions {
  resources: readonly DiscoveryResource[];
  /** Shared HTTP client; defaults to the global fetch */
  fetch?: typeof fetch;
}

export function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: "text", text }],
    isError: true,
  };
}

/**
 * Attach the encoded credential to parameters.headers.
 * A header of the same name supplied by the caller is left in place.
 */
export function injectPaymentHeader(parameters: JsonObject | undefined, payment: unknown): JsonObject {
  let header: PaymentHeader;
  try {
    header = encodePaymentHeader(parsePaymentCredential(payment));
  } catch (err) {
    if (err instanceof ValidationError || err instanceof EncodeError) {
      throw new PaymentMetaError(err.message);
    }
    throw err;
  }

  const params: JsonObject = { ...parameters };
  const existing = params["headers"];

  if (existing === undefined) {
    params["headers"] = { [header.name]: header.value };
    return params;
  }

  if (!isObject(existing)) {
    throw new PaymentMetaError(`headers must be an object to set ${header.name}`);
  }

  const headerName = header.name.toLowerCase();
  const callerSetIt = Object.keys(existing).some((key) => key.toLowerCase() === headerName);
  params["headers"] = callerSetIt ? existing : { ...existing, [header.name]: header.value };
  return params;
}

/** Payment-required wins over the normal body rendering */
export function translateResponse(
  response: Pick<Response, "status" | "headers">,
  body: string,
): CallToolResult {
  const paymentRequired = decodePaymentRequired(response, body);
  if (paymentRequired) {
    return {
      content: [{ type: "text", text: JSON.stringify(paymentRequired) }],
      structuredContent: paymentRequired,
      isError: true,
    };
  }

  const payload = {
    status: response.status,
    headers: headersToRecord(response.headers),
    body,
  };

  const result: CallToolResult = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    isError: response.status >= 400,
  };

  const paymentResponse = decodePaymentResponse(response);
  if (paymentResponse) {
    result._meta = { [PAYMENT_RESPONSE_META_KEY]: paymentResponse };
  }

  return result;
}

export async function httpResponseToToolResult(
  response: Response,
  limit = MAX_PROXY_RESPONSE_BYTES,
): Promise<CallToolResult> {
  const body = await readBoundedText(response, limit);
  return translateResponse(response, body);
}

export class ProxyInvoker {
  private readonly resources: readonly DiscoveryResource[];
  private readonly fetchFn: typeof fetch;

  constructor(options: ProxyInvokerOptions) {
    this.resources = options.resources;
    this.fetchFn = options.fetch ?? fetch;
  }

  /** First tool-eligible resource whose derived name matches */
  resolve(toolName: string): DiscoveryResource {
    const match = this.resources.find(
      (resource) => isHttpResource(resource) && toolNameFor(resource) === toolName,
    );
    if (!match) {
      throw new NotFoundError(`tool "${toolName}" not found`, { toolName });
    }
    return match;
  }

  async invoke(call: ProxyCall): Promise<CallToolResult> {
    if (!call.toolName) {
      return errorResult("Error: 'toolName' parameter is required.");
    }

    let parameters = call.parameters;
    if (call.payment !== undefined && call.payment !== null) {
      try {
        parameters = injectPaymentHeader(parameters, call.payment);
      } catch (err) {
        if (err instanceof PaymentMetaError) {
          return errorResult(`Error: invalid x402 payment metadata: ${err.message}`);
        }
        throw err;
      }
    }

    let resource: DiscoveryResource;
    try {
      resource = this.resolve(call.toolName);
    } catch (err) {
      if (err instanceof NotFoundError) return errorResult(err.message);
      throw err;
    }

    let request: ProxyRequest;
    try {
      request = buildProxyRequest(resource, parameters ?? {});
    } catch (err) {
      if (err instanceof ValidationError) return errorResult(`Error: ${err.message}`);
      throw err;
    }

    return this.send(request, call.signal);
  }

  private async send(request: ProxyRequest, signal: AbortSignal | undefined): Promise<CallToolResult> {
    const timeout = AbortSignal.timeout(PROXY_TIMEOUT_MS);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: combined,
      });
      return await httpResponseToToolResult(response);
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError("proxy call cancelled", { url: request.url });
      }
      if (timeout.aborted) {
        throw new UpstreamError(`proxy request timed out after ${PROXY_TIMEOUT_MS}ms`, { url: request.url }, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`proxy request failed: ${reason}`, { url: request.url }, { cause: err });
    }
  }
}

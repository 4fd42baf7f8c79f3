// Resource server: a paid weather endpoint speaking x402 v2
// Hand-rolled x402 flow: no @x402 middleware, just the protocol.

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { canonicalJson, decodeBase64Json } from "../src/payment/codec.js";
import { DecodeError } from "../src/errors.js";
import { isObject } from "../src/types/guards.js";
import {
  PAYMENT_REQUIRED_HEADER,
  PAYMENT_RESPONSE_HEADER,
  PAYMENT_SIGNATURE_HEADER,
  type JsonObject,
} from "../src/types/x402.js";

const FACILITATOR_URL = process.env["FACILITATOR_URL"] ?? "https://x402.org/facilitator";
const PAY_TO = process.env["PAY_TO"] ?? "0x1111111111111111111111111111111111111111";
const port = Number(process.env["PORT"] ?? 3401);

const resourceUrl = `http://localhost:${port}/weather`;

const accepted = {
  scheme: "exact",
  network: "eip155:84532",
  amount: "10000", // 0.01 USDC
  asset: "0x036CbD53842c5426634e7929541eC2318f3dCF7e",
  payTo: PAY_TO,
  maxTimeoutSeconds: 60,
  extra: { name: "USDC", version: "2" },
};

const paymentRequired = {
  x402Version: 2,
  error: "payment required",
  resource: {
    url: resourceUrl,
    description: "Current weather for a city",
    mimeType: "application/json",
  },
  accepts: [accepted],
};

function encodeHeader(value: unknown): string {
  return Buffer.from(canonicalJson(value), "utf-8").toString("base64");
}

async function callFacilitator(path: "verify" | "settle", paymentPayload: JsonObject): Promise<JsonObject> {
  const res = await fetch(`${FACILITATOR_URL}/${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ x402Version: 2, paymentPayload, paymentRequirements: accepted }),
  });
  const body: unknown = await res.json();
  return isObject(body) ? body : {};
}

const app = new Hono();

app.get("/health", (c) => c.json({ status: "ok" }));

// GET /weather?city=CityName: synthetic weather, 0.01 USDC per call
app.get("/weather", async (c) => {
  const city = c.req.query("city");
  if (!city) {
    return c.json({ error: "city query param is required" }, 400);
  }

  const paymentHeader = c.req.header(PAYMENT_SIGNATURE_HEADER);

  // No payment → 402
  if (!paymentHeader) {
    return c.json({}, 402, { [PAYMENT_REQUIRED_HEADER]: encodeHeader(paymentRequired) });
  }

  let paymentPayload: JsonObject;
  try {
    paymentPayload = decodeBase64Json(paymentHeader);
  } catch (err) {
    if (err instanceof DecodeError) {
      return c.json({ error: `Malformed ${PAYMENT_SIGNATURE_HEADER} header: ${err.message}` }, 400);
    }
    throw err;
  }

  const verifyResult = await callFacilitator("verify", paymentPayload);
  if (verifyResult["isValid"] !== true) {
    return c.json({}, 402, {
      [PAYMENT_REQUIRED_HEADER]: encodeHeader({ ...paymentRequired, error: verifyResult["invalidReason"] ?? "invalid payment" }),
    });
  }

  const settleResult = await callFacilitator("settle", paymentPayload);
  if (settleResult["success"] !== true) {
    return c.json({ error: "Payment settlement failed", reason: settleResult["errorReason"] }, 502);
  }

  // Payment settled: serve the resource
  return c.json(
    {
      city,
      temperature: 71.2,
      conditions: "Partly cloudy",
      unit: "fahrenheit",
    },
    200,
    {
      [PAYMENT_RESPONSE_HEADER]: encodeHeader({
        success: true,
        transaction: settleResult["transaction"],
        network: settleResult["network"],
        payer: settleResult["payer"],
      }),
    },
  );
});

serve({ fetch: app.fetch, port }, () => {
  console.log(`Resource server listening on port ${port}`);
});

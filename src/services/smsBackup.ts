import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import type { RawMessage } from "../types/index.js";

export class SmsBackupFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SmsBackupFormatError";
  }
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  parseTagValue: false,
  htmlEntities: true,
  isArray: (name) => name === "sms",
});

// <sms address="M-Money" date="1715351458724" body="..."/> or a child <body> element
const SmsElementSchema = z.union([
  z.string(),
  z
    .object({
      body: z.string().optional(),
      date: z.string().optional(),
      address: z.string().optional(),
    })
    .passthrough(),
]);

const SmsBackupSchema = z.object({
  smses: z.union([
    z.string(),
    z.object({ sms: z.array(SmsElementSchema).optional() }).passthrough(),
  ]),
});

function parseEpochMillis(value: string | undefined): Date | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  const date = new Date(Number(value.trim()));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Read an SMS backup export into raw messages, one per <sms> element, in
 * document order. Elements without a body still produce a message (with an
 * empty body) so nothing is dropped before the pipeline sees it.
 */
export function parseSmsBackup(xml: string): RawMessage[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new SmsBackupFormatError(
      `Invalid XML at line ${validation.err.line}: ${validation.err.msg}`
    );
  }

  const parsed = SmsBackupSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new SmsBackupFormatError("Expected an <smses> root element");
  }

  const { smses } = parsed.data;
  if (typeof smses === "string") return [];

  return (smses.sms ?? []).map((element) => {
    if (typeof element === "string") {
      return { body: element, receivedAt: null, address: null };
    }
    return {
      body: element.body ?? "",
      receivedAt: parseEpochMillis(element.date),
      address: element.address ?? null,
    };
  });
}

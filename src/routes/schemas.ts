import { z } from "zod";
import type { AttachmentInput } from "../services/idea.service";

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/** Uploads travel inline as base64 in JSON bodies. */
export const attachmentsSchema = z
  .array(
    z.object({
      name: z.string().min(1).max(255),
      data: z.string().min(1).regex(BASE64, "data must be base64"),
    })
  )
  .max(10)
  .optional()
  .transform((files): AttachmentInput[] =>
    (files ?? []).map((f) => ({ name: f.name, data: Buffer.from(f.data, "base64") }))
  );

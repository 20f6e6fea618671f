/**
 * Model registry: `ai_registerModel`, `ai_getModel` and `ai_listModels`.
 *
 * Registration is a plain RPC call keyed by the model hash; jobs later reference the
 * model through that hash.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { log } from "../client/logger";
import { normalizeHash } from "../protocol/format";
import type { Hash, ModelInfo, ModelMetadata } from "../protocol/types";
import type { LedgerClient } from "../rpc/client";
import { hashSchema, modelInfoSchema, modelMetadataSchema } from "../rpc/schemas";

const modelListSchema = z.array(hashSchema);

export class Models {
  constructor(private readonly client: LedgerClient) {}

  /**
   * @throws ValidationError (INVALID_MODEL_METADATA) before any call when the metadata is incomplete
   */
  async registerModel(modelHash: Hash, metadata: ModelMetadata): Promise<void> {
    const hash = normalizeHash(modelHash, "modelHash");
    const parsed = modelMetadataSchema.safeParse(metadata);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ValidationError(`Invalid model metadata: ${issues.join("; ")}`, "INVALID_MODEL_METADATA", { issues });
    }
    await this.client.rpc("ai_registerModel", [hash, parsed.data], z.unknown());
    log("info", "Model registered", { modelHash: hash, name: parsed.data.name, version: parsed.data.version });
  }

  /** `undefined` only when the node answers `null`; RPC errors propagate. */
  async getModel(modelHash: Hash): Promise<ModelInfo | undefined> {
    return this.client.rpcOptional("ai_getModel", [normalizeHash(modelHash, "modelHash")], modelInfoSchema);
  }

  async listModels(): Promise<Hash[]> {
    return this.client.rpc("ai_listModels", [], modelListSchema);
  }
}

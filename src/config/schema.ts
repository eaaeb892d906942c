import * as z from "zod";

export const SimpleFormatSchema = z.enum(["HTML", "JSON", "ALL"]);
export const StorageBackendSchema = z.enum(["filesystem", "object-store"]);
export const CompareMethodSchema = z.enum(["hash", "stat"]);

const positiveSeconds = z.number().positive();
const poolSize = z.number().int().min(1).max(10);

export const ObjectStoreSchema = z
	.object({
		bucket: z.string().min(1),
		prefix: z.string().optional(),
		region: z.string().min(1).optional(),
		endpoint: z.string().url().optional(),
	})
	.strict();

export const MirrorOptionsSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		directory: z.string().min(1),
		json: z.boolean().optional(),
		"release-files": z.boolean().optional(),
		cleanup: z.boolean().optional(),
		master: z.string().url().optional(),
		timeout: positiveSeconds.optional(),
		"global-timeout": positiveSeconds.optional(),
		workers: poolSize.optional(),
		verifiers: poolSize.optional(),
		"hash-index": z.boolean().optional(),
		"simple-format": SimpleFormatSchema.optional(),
		"stop-on-error": z.boolean().optional(),
		"allow-upstream-serial-mismatch": z.boolean().optional(),
		"storage-backend": StorageBackendSchema.optional(),
		keep_index_versions: z.number().int().min(0).optional(),
		"compare-method": CompareMethodSchema.optional(),
		"download-mirror": z.string().url().optional(),
		"download-mirror-no-fallback": z.boolean().optional(),
		"diff-file": z.string().min(1).optional(),
		"diff-append-epoch": z.boolean().optional(),
		retries: z.number().int().min(0).max(20).optional(),
		"retry-backoff-ms": z.number().int().min(0).optional(),
		"verify-queue-size": z.number().int().min(1).optional(),
		"changelog-max-range": z.number().int().min(1).optional(),
		"run-timeout": positiveSeconds.optional(),
		"root-index": z.boolean().optional(),
		"object-store": ObjectStoreSchema.optional(),
	})
	.strict();

export type MirrorOptions = z.infer<typeof MirrorOptionsSchema>;
export type SimpleFormat = z.infer<typeof SimpleFormatSchema>;
export type StorageBackendKind = z.infer<typeof StorageBackendSchema>;
export type CompareMethod = z.infer<typeof CompareMethodSchema>;
export type ObjectStoreOptions = z.infer<typeof ObjectStoreSchema>;

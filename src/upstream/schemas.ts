import * as z from "zod";

export const UpstreamFileSchema = z
	.object({
		filename: z.string().min(1),
		url: z.string().url(),
		digests: z.object({ sha256: z.string().regex(/^[a-f0-9]{64}$/) }).passthrough(),
		size: z.number().int().min(0),
		upload_time_iso_8601: z.string().optional(),
		requires_python: z.string().nullable().optional(),
		yanked: z.boolean().optional(),
		yanked_reason: z.string().nullable().optional(),
	})
	.passthrough();

export const PackageMetadataSchema = z
	.object({
		info: z.object({ name: z.string().min(1) }).passthrough(),
		last_serial: z.number().int().min(0).optional(),
		releases: z.record(z.array(UpstreamFileSchema)).default({}),
	})
	.passthrough();

export type UpstreamFile = z.infer<typeof UpstreamFileSchema>;
export type PackageMetadata = z.infer<typeof PackageMetadataSchema>;

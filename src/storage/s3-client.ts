import { Readable } from "node:stream";
import {
	CopyObjectCommand,
	DeleteObjectCommand,
	GetObjectCommand,
	HeadObjectCommand,
	ListObjectsV2Command,
	PutObjectCommand,
	S3Client,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type { ObjectStoreOptions } from "../config";
import type { ObjectBody, ObjectHead, ObjectStoreClient } from "./object-store";

const isMissing = (error: unknown) =>
	error instanceof Error &&
	(error.name === "NoSuchKey" || error.name === "NotFound");

const encodeCopySource = (bucket: string, key: string) =>
	`${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;

export class S3ObjectStoreClient implements ObjectStoreClient {
	private readonly client: S3Client;
	private readonly bucket: string;

	constructor(options: ObjectStoreOptions, client?: S3Client) {
		this.bucket = options.bucket;
		this.client =
			client ??
			new S3Client({
				region: options.region ?? "us-east-1",
				...(options.endpoint
					? { endpoint: options.endpoint, forcePathStyle: true }
					: {}),
			});
	}

	/**
	 * Buffers go up in one request. Streams of unknown length go through a
	 * multipart upload, which holds at most a few parts in memory.
	 */
	async putObject(key: string, body: ObjectBody) {
		if (body instanceof Uint8Array) {
			await this.client.send(
				new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: body }),
			);
			return;
		}
		const upload = new Upload({
			client: this.client,
			params: { Bucket: this.bucket, Key: key, Body: body },
		});
		await upload.done();
	}

	async getObject(key: string): Promise<Readable | null> {
		try {
			const response = await this.client.send(
				new GetObjectCommand({ Bucket: this.bucket, Key: key }),
			);
			const body = response.Body;
			if (!body) {
				return Readable.from([]);
			}
			if (body instanceof Readable) {
				return body;
			}
			return Readable.from([Buffer.from(await body.transformToByteArray())]);
		} catch (error) {
			if (isMissing(error)) {
				return null;
			}
			throw error;
		}
	}

	async headObject(key: string): Promise<ObjectHead | null> {
		try {
			const response = await this.client.send(
				new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
			);
			return {
				size: response.ContentLength ?? 0,
				lastModifiedMs: response.LastModified?.getTime() ?? 0,
			};
		} catch (error) {
			if (isMissing(error)) {
				return null;
			}
			throw error;
		}
	}

	async deleteObject(key: string) {
		await this.client.send(
			new DeleteObjectCommand({ Bucket: this.bucket, Key: key }),
		);
	}

	async listObjects(prefix: string) {
		const keys: string[] = [];
		let continuationToken: string | undefined;
		do {
			const response = await this.client.send(
				new ListObjectsV2Command({
					Bucket: this.bucket,
					Prefix: prefix,
					ContinuationToken: continuationToken,
				}),
			);
			for (const entry of response.Contents ?? []) {
				if (entry.Key) {
					keys.push(entry.Key);
				}
			}
			continuationToken = response.IsTruncated
				? response.NextContinuationToken
				: undefined;
		} while (continuationToken);
		return keys;
	}

	async copyObject(from: string, to: string) {
		await this.client.send(
			new CopyObjectCommand({
				Bucket: this.bucket,
				Key: to,
				CopySource: encodeCopySource(this.bucket, from),
			}),
		);
	}
}

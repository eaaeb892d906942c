import { relativeHref } from "../paths";
import type { PackageRecord, ReleaseFile } from "../state/package-records";

export const REPOSITORY_VERSION = "1.1";

export type RenderOptions = {
	/** Directory the listing is served from, for relative artifact links. */
	simpleDir: string;
	/** Link to the mirrored copy instead of the upstream URL. */
	releaseFiles: boolean;
};

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#x27;",
};

export const escapeHtml = (value: string) =>
	value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const fileUrl = (file: ReleaseFile, options: RenderOptions) =>
	options.releaseFiles
		? relativeHref(options.simpleDir, file.localPath)
		: file.sourceUrl;

const renderAnchor = (file: ReleaseFile, options: RenderOptions) => {
	const href = `${fileUrl(file, options)}#sha256=${file.upstreamHash}`;
	let attributes = "";
	if (file.requiresPython) {
		attributes += ` data-requires-python="${escapeHtml(file.requiresPython)}"`;
	}
	if (file.yanked !== false) {
		const reason = typeof file.yanked === "string" ? file.yanked : "";
		attributes += ` data-yanked="${escapeHtml(reason)}"`;
	}
	return `    <a href="${escapeHtml(href)}"${attributes}>${escapeHtml(file.filename)}</a><br/>`;
};

/**
 * HTML project page with a trailing serial comment.
 */
export const renderHtml = (record: PackageRecord, options: RenderOptions) => {
	const title = `Links for ${escapeHtml(record.name)}`;
	const lines = [
		"<!DOCTYPE html>",
		"<html>",
		"  <head>",
		`    <meta name="pypi:repository-version" content="${REPOSITORY_VERSION}">`,
		`    <title>${title}</title>`,
		"  </head>",
		"  <body>",
		`    <h1>${title}</h1>`,
		...record.releaseFiles.map((file) => renderAnchor(file, options)),
		"  </body>",
		"</html>",
		`<!--SERIAL ${record.serial}-->`,
	];
	return `${lines.join("\n")}\n`;
};

export const renderJson = (record: PackageRecord, options: RenderOptions) => {
	const versions: string[] = [];
	for (const file of record.releaseFiles) {
		if (!versions.includes(file.version)) {
			versions.push(file.version);
		}
	}
	const document = {
		meta: { "api-version": REPOSITORY_VERSION, "_last-serial": record.serial },
		name: record.normalizedName,
		files: record.releaseFiles.map((file) => ({
			filename: file.filename,
			url: fileUrl(file, options),
			hashes: { sha256: file.upstreamHash },
			...(file.requiresPython ? { "requires-python": file.requiresPython } : {}),
			size: file.size,
			...(file.uploadTime ? { "upload-time": file.uploadTime } : {}),
			yanked: file.yanked,
		})),
		versions,
	};
	return JSON.stringify(document);
};

export type RootEntry = {
	normalizedName: string;
	/** Path of the project directory relative to the simple root. */
	href: string;
};

export const renderRootHtml = (entries: RootEntry[]) => {
	const lines = [
		"<!DOCTYPE html>",
		"<html>",
		"  <head>",
		`    <meta name="pypi:repository-version" content="${REPOSITORY_VERSION}">`,
		"    <title>Simple Index</title>",
		"  </head>",
		"  <body>",
		...entries.map(
			(entry) =>
				`    <a href="${escapeHtml(entry.href)}">${escapeHtml(entry.normalizedName)}</a><br/>`,
		),
		"  </body>",
		"</html>",
	];
	return `${lines.join("\n")}\n`;
};

export const renderRootJson = (entries: RootEntry[], serial: number) =>
	JSON.stringify({
		meta: { "api-version": REPOSITORY_VERSION, "_last-serial": serial },
		projects: entries.map((entry) => ({ name: entry.normalizedName })),
	});

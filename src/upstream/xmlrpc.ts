import { XMLParser } from "fast-xml-parser";

export type XmlRpcValue =
	| string
	| number
	| boolean
	| null
	| XmlRpcValue[]
	| { [key: string]: XmlRpcValue };

export type XmlRpcParam = string | number | boolean;

export class XmlRpcFault extends Error {
	constructor(
		public readonly faultCode: number,
		public readonly faultString: string,
	) {
		super(`XML-RPC fault ${faultCode}: ${faultString}`);
		this.name = "XmlRpcFault";
	}
}

const ARRAY_TAGS = new Set(["value", "member", "param"]);

const parser = new XMLParser({
	ignoreAttributes: true,
	parseTagValue: false,
	trimValues: false,
	isArray: (name) => ARRAY_TAGS.has(name),
});

const escapeXml = (value: string) =>
	value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");

const encodeParam = (value: XmlRpcParam) => {
	if (typeof value === "number") {
		return Number.isInteger(value)
			? `<int>${value}</int>`
			: `<double>${value}</double>`;
	}
	if (typeof value === "boolean") {
		return `<boolean>${value ? 1 : 0}</boolean>`;
	}
	return `<string>${escapeXml(value)}</string>`;
};

export const encodeMethodCall = (method: string, params: XmlRpcParam[] = []) => {
	const encoded = params
		.map((param) => `<param><value>${encodeParam(param)}</value></param>`)
		.join("");
	return `<?xml version="1.0"?><methodCall><methodName>${escapeXml(method)}</methodName><params>${encoded}</params></methodCall>`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const asText = (value: unknown) =>
	typeof value === "string" || typeof value === "number" ? String(value) : "";

const firstValue = (node: unknown): unknown =>
	Array.isArray(node) ? node[0] : node;

const decodeValue = (node: unknown): XmlRpcValue => {
	if (!isRecord(node)) {
		return asText(node);
	}
	if ("string" in node) return asText(node.string);
	for (const tag of ["int", "i4", "i8", "double"]) {
		if (tag in node) return Number(asText(node[tag]).trim());
	}
	if ("boolean" in node) return asText(node.boolean).trim() === "1";
	if ("nil" in node) return null;
	if ("array" in node) {
		const data = isRecord(node.array) ? node.array.data : undefined;
		const values = isRecord(data) && Array.isArray(data.value) ? data.value : [];
		return values.map(decodeValue);
	}
	if ("struct" in node) {
		const members =
			isRecord(node.struct) && Array.isArray(node.struct.member)
				? node.struct.member
				: [];
		const result: { [key: string]: XmlRpcValue } = {};
		for (const member of members) {
			if (!isRecord(member)) continue;
			result[asText(member.name)] = decodeValue(firstValue(member.value));
		}
		return result;
	}
	return "";
};

export const decodeMethodResponse = (xml: string): XmlRpcValue => {
	const document: unknown = parser.parse(xml);
	const response = isRecord(document) ? document.methodResponse : undefined;
	if (!isRecord(response)) {
		throw new Error("Malformed XML-RPC response: missing methodResponse.");
	}
	if (isRecord(response.fault)) {
		const fault = decodeValue(firstValue(response.fault.value));
		const code = isRecord(fault) ? fault.faultCode : undefined;
		const message = isRecord(fault) ? fault.faultString : undefined;
		throw new XmlRpcFault(
			typeof code === "number" ? code : 0,
			typeof message === "string" ? message : "unknown fault",
		);
	}
	const params = isRecord(response.params) ? response.params.param : undefined;
	const param = firstValue(params);
	if (!isRecord(param)) {
		throw new Error("Malformed XML-RPC response: missing params.");
	}
	return decodeValue(firstValue(param.value));
};

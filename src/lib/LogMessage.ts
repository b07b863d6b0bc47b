// initialize debugging
import debugPackage from "debug";
const debug = debugPackage("coap-exchange:message");

import { Message, MessageType } from "../Message";
import { Peer } from "./Peer";

export function logMessage(msg: Message, direction: "sent" | "received", peer: Peer, includePayload: boolean = true): void {
	if (!debug.enabled) return;
	debug("=============================");
	debug(`${direction} message ${direction === "sent" ? "to" : "from"} ${peer}`);
	debug(`messageId: 0x${msg.messageId.toString(16)}`);
	if (msg.token.length > 0) {
		debug(`token: ${msg.token.toString("hex")}`);
	}
	debug(`code: ${msg.code}`);
	debug(`type: ${MessageType[msg.type]}`);
	debug(`version: ${msg.version}`);
	debug("options:");
	for (const opt of msg.options) {
		debug(`  ${opt.toString()}`);
	}
	if (includePayload && msg.payload.length > 0) {
		debug("payload:");
		debug(msg.payload.toString("utf-8"));
	}
	debug("=============================");
}

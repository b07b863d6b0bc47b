export { CoapEndpoint } from "./CoapEndpoint";
export type {
	CoapRequest, CoapResponse, EndpointOptions, RequestHandle, RequestMethod, RequestOptions,
	ResourceHandler, ResourceHandlers, ResourceResponse,
} from "./CoapEndpoint";
export { ContentFormats } from "./ContentFormats";
export * from "./Errors";
export { ClientExchange, ServerExchange } from "./Exchange";
export type { ClientExchangeState, NotificationCallback, ServerExchangeState } from "./Exchange";
export { ExchangeEngine } from "./ExchangeEngine";
export type { ExchangeEngineHost, ExchangeEngineOptions, OutgoingRequest, ResponseContent } from "./ExchangeEngine";
export type { DatagramTransport } from "./lib/DatagramTransport";
export { MemoryTransport } from "./lib/MemoryTransport";
export { COAP_PORT, Peer } from "./lib/Peer";
export { SocketWrapper } from "./lib/SocketWrapper";
export type { UdpSocket } from "./lib/SocketWrapper";
export { Link, parseLinkFormat, parseLinks, renderLinkFormat } from "./LinkFormat";
export type { LinkParamValue } from "./LinkFormat";
export { COAP_VERSION, MAX_TOKEN_LENGTH, Message, MessageCode, MessageCodes, MessageType } from "./Message";
export type { MessageHeader, MessageInit } from "./Message";
export {
	blockSize, blockSizeToExponent, decodeBlock, encodeBlock, findOptionDefinition, isCriticalOption,
	Option, OptionDefinitions, Options,
} from "./Option";
export type { BlockValue, OptionDefinition, OptionName, OptionValueTypes } from "./Option";
export { DefaultTransmissionParameters } from "./TransmissionParameters";
export type { TransmissionParameters } from "./TransmissionParameters";
export { ResourceRouter } from "./ResourceRouter";
export type { RouteMatch } from "./ResourceRouter";

/**
 * Transport Exports
 */

export { ConsoleTransport, formatConsoleLine, type ConsoleTransportOptions, type ConsoleFormatOptions } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";

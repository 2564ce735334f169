// CHANGE: Public surface of shell output

export {
	reportConfigError,
	reportCorpusError,
	writeLines,
	writeRaw,
} from "./printer.js";

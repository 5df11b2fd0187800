import type { DocSource } from "../../src/domain/index.js";

export const VOICE_DOC = [
	"# Voice Setup",
	"Use the VoiceButton component for microphone access.",
	"",
	"# Chat",
	"The chat supports voice replies and voice input.",
	"",
].join("\n");

export const MASTRA_DOC = [
	"# Workflows",
	"Create a workflow with steps.",
	"# Agents",
	"Agents use tools and memory.",
	"",
].join("\n");

export function textSource(id: string, text: string): DocSource {
	return { format: "text", id, text };
}

export function jsonSource(id: string, records: unknown): DocSource {
	return { format: "json", id, text: JSON.stringify(records, null, 2) };
}

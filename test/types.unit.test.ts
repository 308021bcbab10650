// SPDX-License-Identifier: MIT
// STRATA Taxonomy and Builders - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ALL_TAGS,
	CORE_TAGS,
	EXTENDED_TAGS,
	STRUCTURAL_TAGS,
	isTag,
	layerOf,
	maxLayer,
} from "../src/types.js";
import {
	binaryOp,
	collectionOp,
	conditional,
	float,
	int,
	languageSpecific,
	nil,
	paramDefault,
	str,
	variable,
} from "../src/builders.js";
import { detectLanguage, isLanguage, LANGUAGES } from "../src/native/languages.js";

describe("Tag vocabulary", () => {
	it("has 28 distinct tags across the four layers", () => {
		assert.equal(ALL_TAGS.length, 28);
		assert.equal(new Set(ALL_TAGS).size, 28);
		assert.equal(CORE_TAGS.length, 14);
		assert.equal(EXTENDED_TAGS.length, 7);
		assert.equal(STRUCTURAL_TAGS.length, 6);
	});

	it("isTag accepts known tags only", () => {
		assert.equal(isTag("binary_op"), true);
		assert.equal(isTag("language_specific"), true);
		assert.equal(isTag("binaryop"), false);
		assert.equal(isTag(3), false);
	});

	it("layerOf classifies each layer", () => {
		assert.equal(layerOf("inline_match"), "core");
		assert.equal(layerOf("collection_op"), "extended");
		assert.equal(layerOf("augmented_assignment"), "structural");
		assert.equal(layerOf("language_specific"), "native");
	});

	it("maxLayer orders core < extended < structural < native", () => {
		assert.equal(maxLayer("core", "extended"), "extended");
		assert.equal(maxLayer("native", "structural"), "native");
		assert.equal(maxLayer("core", "core"), "core");
	});
});

describe("Builders", () => {
	it("produce (tag, meta, payload) triples with empty meta by default", () => {
		assert.deepEqual(binaryOp("arithmetic", "+", variable("x"), int(5)), {
			tag: "binary_op",
			meta: {},
			payload: [
				"arithmetic",
				"+",
				{ tag: "variable", meta: {}, payload: "x" },
				{ tag: "literal", meta: {}, payload: ["integer", 5] },
			],
		});
	});

	it("literal shorthands carry their subtype", () => {
		assert.deepEqual(float(1.5).payload, ["float", 1.5]);
		assert.deepEqual(str("a").payload, ["string", "a"]);
		assert.deepEqual(nil().payload, ["null", null]);
	});

	it("conditional keeps a null else branch", () => {
		assert.equal(conditional(variable("a"), int(1), null).payload[2], null);
	});

	it("collectionOp defaults initial to null", () => {
		assert.equal(collectionOp("map", variable("f"), variable("xs")).payload[3], null);
	});

	it("paramDefault stores name and fallback", () => {
		assert.deepEqual(paramDefault("n", int(0)).payload, ["default", "n", int(0)]);
	});

	it("languageSpecific keeps the native value by reference", () => {
		const native = { _type: "With" };
		const node = languageSpecific("python", "with", native, { line: 3 });
		assert.equal(node.payload[2], native);
		assert.deepEqual(node.meta, { line: 3 });
	});
});

describe("Languages", () => {
	it("lists the three supported languages", () => {
		assert.deepEqual(LANGUAGES, ["elixir", "python", "typescript"]);
		assert.equal(isLanguage("python"), true);
		assert.equal(isLanguage("ruby"), false);
	});

	it("detectLanguage maps file extensions", () => {
		assert.equal(detectLanguage("lib/app.exs"), "elixir");
		assert.equal(detectLanguage("main.PY"), "python");
		assert.equal(detectLanguage("src/index.tsx"), "typescript");
		assert.equal(detectLanguage("Makefile"), undefined);
		assert.equal(detectLanguage("notes.txt"), undefined);
	});
});

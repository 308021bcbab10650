import eslint from "@eslint/js";
import markdown from "@eslint/markdown";
import jsonc from "eslint-plugin-jsonc";
import tseslint from "typescript-eslint";
import type { Linter, Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

const TEST_SUFFIXES = [".unit.test.ts", ".integration.test.ts"];

// Tests are *.unit.test.ts or *.integration.test.ts under test/
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description: "Enforce .unit.test.ts / .integration.test.ts test files under test/",
		},
		messages: {
			invalidTestFileName: "Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
			misplacedTest: "Test files live under test/. Found: '{{actual}}'",
		},
	},
	create(context) {
		const filename = context.filename;
		return {
			Program() {
				if (!filename.endsWith(".test.ts")) return;
				const loc = { column: 0, line: 1 };
				if (!TEST_SUFFIXES.some((suffix) => filename.endsWith(suffix))) {
					context.report({ loc, messageId: "invalidTestFileName", data: { actual: filename } });
				}
				if (!/[\\/]test[\\/]/.test(filename)) {
					context.report({ loc, messageId: "misplacedTest", data: { actual: filename } });
				}
			},
		};
	},
};

const jsoncPlugin = { jsonc: jsonc };

const STYLE_RULES: Linter.RulesRecord = {
	indent: ["error", "tab"],
	quotes: ["error", "double", { avoidEscape: true }],
};

export default [
	{
		ignores: ["dist/**", "node_modules/**", "eslint.config.ts"],
	},

	{
		files: ["**/*.test.ts"],
		plugins: {
			strata: { rules: { "test-file-naming": testFileNamingRule } },
		},
		rules: {
			"strata/test-file-naming": "error",
		},
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Sources: strict type-aware rules
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	...tseslint.configs.stylisticTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		linterOptions: {
			noInlineConfig: true,
		},
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			...STYLE_RULES,
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/restrict-plus-operands": ["error", { allowNumberAndString: true }],
			// Narrow with guards; no assertions
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/non-nullable-type-assertion-style": "off",
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			// Verbose notes go through console.warn only
			"no-console": ["error", { allow: ["warn"] }],
			"max-depth": ["warn", { max: 4 }],
			"max-nested-callbacks": ["warn", { max: 3 }],
		},
	},

	// Tests: syntax-level rules
	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			...STYLE_RULES,
			"@typescript-eslint/ban-ts-comment": "error",
		},
	},

	// JSON: tsconfig files, package.json and native AST fixtures
	...jsonc.configs["flat/recommended-with-json"].map((config) => ({
		...config,
		files: ["**/*.json"],
		ignores: ["**/*.md/**"],
	})),
	{
		files: ["**/*.json"],
		ignores: ["**/*.md/**"],
		rules: {
			"jsonc/indent": ["error", "tab"],
			"jsonc/quotes": ["error", "double"],
		},
	},
	{
		files: ["package.json"],
		plugins: jsoncPlugin,
		rules: {
			"jsonc/sort-keys": ["error",
				{
					pathPattern: "^$",
					order: [
						"name",
						"version",
						"private",
						"description",
						"license",
						"type",
						"main",
						"types",
						"exports",
						"scripts",
						"dependencies",
						"devDependencies",
						"engines",
					],
				},
				{
					pathPattern: "^(?:dependencies|devDependencies|scripts)$",
					order: { type: "asc" },
				},
			],
		},
	},

	// Markdown: SPEC_FULL.md, DESIGN.md
	...markdown.configs.recommended.map((config) => ({
		...config,
		files: ["**/*.md"],
	})),
	{
		files: ["**/*.md"],
		rules: {
			"markdown/fenced-code-language": "off",
		},
	},
] satisfies ConfigArray;

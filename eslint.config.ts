import eslint from "@eslint/js";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

// Test files must say which tier they belong to
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description: "Require test files to end with .unit.test.ts or .integration.test.ts",
			recommended: true,
		},
		messages: {
			invalidTestFileName:
				"Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
		},
	},
	create(context) {
		const filename = context.filename;
		return {
			Program() {
				if (!/\.(test|spec)\.ts$/.test(filename)) {
					return;
				}
				if ([".unit.test.ts", ".integration.test.ts"].some((suffix) => filename.endsWith(suffix))) {
					return;
				}
				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

export default [
	{
		ignores: ["dist/**", "node_modules/**", "coverage/**", "*.config.ts"],
	},

	{
		files: ["**/*.test.ts", "**/*.spec.ts"],
		plugins: {
			reforge: { rules: { "test-file-naming": testFileNamingRule } },
		},
		rules: {
			"reforge/test-file-naming": "error",
		},
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Type-aware rules for the library sources
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
			"@typescript-eslint/no-unused-vars": "error",
			"@typescript-eslint/no-explicit-any": "error",
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/non-nullable-type-assertion-style": "off",
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			indent: ["error", "tab"],
			quotes: ["error", "double", { avoidEscape: true }],
			"max-lines": ["warn", { max: 400, skipBlankLines: true, skipComments: true }],
			"max-depth": ["warn", { max: 4 }],
			"max-nested-callbacks": ["warn", { max: 3 }],
		},
	},

	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			"@typescript-eslint/no-unused-vars": "error",
			"@typescript-eslint/ban-ts-comment": "error",
			indent: ["error", "tab"],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},
] satisfies ConfigArray;

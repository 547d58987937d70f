import "@total-typescript/ts-reset";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { includeIgnoreFile } from "@eslint/compat";
import tseslint from "typescript-eslint";
import eslint from "@eslint/js";
import eslintPluginPrettier from "eslint-plugin-prettier/recommended";
import globals from "globals";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const gitignorePath = path.resolve(__dirname, ".gitignore");

const config: ReturnType<typeof tseslint.config> = tseslint.config(
  eslint.configs.recommended,
  tseslint.configs.recommended,
  eslintPluginPrettier,
  includeIgnoreFile(gitignorePath),
  {
    ignores: ["**/.git/**", "**/node_modules/**", "**/dist/**"],
  },
  {
    languageOptions: {
      globals: { ...globals.node },
    },
  },
  {
    files: ["packages/*/src/**/*.ts"],
    rules: {
      "@typescript-eslint/consistent-type-assertions": [
        "error",
        { assertionStyle: "never" },
      ],
    },
  },
);

export default config;

import path from "path";

export const DEFAULT_PHONEBOOK_FILE = "phonebook.csv";
export const DEFAULT_PAGE_SIZE = 5;

export type PhonebookConfig = {
  filePath: string;
  pageSize: number;
};

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): PhonebookConfig {
  const pageSize = Number(
    env.PHONEBOOK_PAGE_SIZE || String(DEFAULT_PAGE_SIZE),
  );

  return {
    filePath: path.resolve(cwd, env.PHONEBOOK_FILE || DEFAULT_PHONEBOOK_FILE),
    pageSize:
      Number.isInteger(pageSize) && pageSize > 0 ? pageSize : DEFAULT_PAGE_SIZE,
  };
}

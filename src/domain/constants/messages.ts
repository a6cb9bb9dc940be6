export const SEVERITY_TAGS = {
  error: "\t***Error: ",
  success: "\t***Success: ",
  info: "\t***Info: ",
} as const;

export type Severity = keyof typeof SEVERITY_TAGS;

interface MessageTemplate {
  readonly severity: Severity | null;
  readonly template: string;
}

export const MESSAGES = {
  noArgs: { severity: "error", template: "No input arguments were specified." },
  fileReadAttempt: { severity: "info", template: "Trying to read in {}" },
  fileEmpty: {
    severity: "info",
    template: "The file at {} is empty... creating the dictionary from scratch",
  },
  unsupportedUsage: {
    severity: "error",
    template:
      "Only one switch (--prefix, --suffix, or --list_all) should be supplied at a time",
  },
  notFound: { severity: "info", template: "The {} {} could not be found in {}" },
  explanation: { severity: null, template: "{}: {}" },
} as const satisfies Record<string, MessageTemplate>;

export type MessageId = keyof typeof MESSAGES;

export const HELP_TEXT = {
  prefix: `${SEVERITY_TAGS.info}Call the script with the --prefix switch and supply the prefix whose meaning you want to know. For example: rtl-meaning --prefix pq_`,
  suffix: `${SEVERITY_TAGS.info}Call the script with the --suffix switch and supply the suffix whose meaning you want to know. For example: rtl-meaning --suffix _req`,
  listAll: `${SEVERITY_TAGS.info}Call the script with the --list_all switch in order to see all of the prefixes and suffixes used in the RTL, as well as their explanations.`,
  pathToDict: `${SEVERITY_TAGS.info}Call the script with the --path_to_dict switch if you want to search a RTL dictionary JSON file on a specific path`,
} as const;

/**
 * Renders a message template, filling each `{}` placeholder in turn.
 * Placeholders without a matching argument are left as they are.
 */
export function formatMessage(id: MessageId, ...args: readonly string[]): string {
  const { severity, template }: MessageTemplate = MESSAGES[id];
  let index = 0;
  const body = template.replace(/\{\}/gu, (placeholder) => {
    const value = args[index];
    index += 1;
    return value ?? placeholder;
  });
  return severity ? `${SEVERITY_TAGS[severity]}${body}` : body;
}

import {makeConverter} from './converter.js';
import type {
  Argument,
  Command,
  DocString,
  EnvBinding,
  Option,
  Positional,
  Root,
} from './typings/model-types.js';

const INDENT = '       ';
const DOC_INDENT = INDENT + '    ';

export interface UsageItem {
  label: string;
  doc: string[];
}

export interface UsageSection {
  title: string;
  /** Free text lines (NAME, SYNOPSIS, DESCRIPTION) */
  lines?: string[];
  items?: UsageItem[];
}

/** Renders help for a command path */
export type UsageRenderer = (
  root: Root,
  commandPath: readonly string[]
) => string;

export function docLines(doc: DocString | undefined): string[] {
  if (doc === undefined) return [];
  return typeof doc === 'string' ? [doc] : doc.slice();
}

/** Follow `commandPath` from the root as far as it matches declared commands */
export function resolveCommand(
  root: Root,
  commandPath: readonly string[]
): {command: Command; names: string[]} {
  let command: Command = root;
  const names = [root.name];
  for (const segment of commandPath) {
    const next = (command.commands ?? []).find(c => c.name === segment);
    if (!next) break;
    command = next;
    names.push(next.name);
  }
  return {command, names};
}

function valueDocv(arg: Option | Positional): string {
  if (arg.docv) return arg.docv;
  const choices = arg.kind === 'option' ? arg.choices : undefined;
  return makeConverter(arg.type, choices).docv;
}

function optionLabel(names: readonly string[], docv?: string): string {
  return names
    .map(name => {
      if (name.length === 1) return docv ? `-${name} ${docv}` : `-${name}`;
      return docv ? `--${name}=${docv}` : `--${name}`;
    })
    .join(', ');
}

function envVar(binding: EnvBinding): string {
  return typeof binding === 'string' ? binding : binding.var;
}

function positionalSynopsis(arg: Positional): string {
  const docv = valueDocv(arg) + (arg.repeated ? '...' : '');
  return arg.required ? docv : `[${docv}]`;
}

/** Doc lines plus annotations for defaults, env, choices and deprecation */
function argumentItems(arg: Argument): UsageItem[] {
  const notes: string[] = [];
  switch (arg.kind) {
    case 'flag':
      if (arg.env !== undefined) notes.push(`env: ${envVar(arg.env)}`);
      if (arg.deprecated) notes.push(`deprecated: ${arg.deprecated}`);
      return [{label: optionLabel(arg.names), doc: annotate(arg.doc, notes)}];
    case 'flag-group':
      return arg.flags.map(entry => ({
        label: optionLabel(entry.names),
        doc: annotate(entry.doc, []),
      }));
    case 'option':
      if (arg.required) notes.push('required');
      if (arg.choices) notes.push(`one of: ${arg.choices.join(', ')}`);
      if (arg.default !== undefined) {
        notes.push(`default: ${JSON.stringify(arg.default)}`);
      }
      if (arg.env !== undefined) notes.push(`env: ${envVar(arg.env)}`);
      return [
        {
          label: optionLabel(arg.names, valueDocv(arg)),
          doc: annotate(arg.doc, notes),
        },
      ];
    case 'positional':
      if (arg.default !== undefined) {
        notes.push(`default: ${JSON.stringify(arg.default)}`);
      }
      return [{label: valueDocv(arg), doc: annotate(arg.doc, notes)}];
  }
}

function annotate(doc: DocString, notes: string[]): string[] {
  const lines = docLines(doc);
  if (notes.length) lines.push(`(${notes.join('; ')})`);
  return lines;
}

/** Build the sections shared by the plain text and man renderers */
export function usageSections(
  root: Root,
  commandPath: readonly string[]
): UsageSection[] {
  const {command, names} = resolveCommand(root, commandPath);
  const args = command.args ?? [];
  const positionals = args.filter(
    (a): a is Positional => a.kind === 'positional'
  );
  const options = args.filter(a => a.kind !== 'positional');
  const commands = command.commands ?? [];

  const synopsis = [names.join(' ')];
  if (options.length) synopsis.push('[OPTION]...');
  if (commands.length) synopsis.push('COMMAND');
  positionals.forEach(p => synopsis.push(positionalSynopsis(p)));

  const sections: UsageSection[] = [
    {
      title: 'NAME',
      lines: [`${names.join('-')} - ${docLines(command.doc)[0] ?? ''}`.trim()],
    },
    {title: 'SYNOPSIS', lines: [synopsis.join(' ')]},
  ];

  const description = docLines(command.doc).slice(1);
  if (description.length) {
    sections.push({title: 'DESCRIPTION', lines: description});
  }
  if (commands.length) {
    sections.push({
      title: 'COMMANDS',
      items: commands.map(c => ({label: c.name, doc: docLines(c.doc)})),
    });
  }
  if (positionals.length) {
    sections.push({
      title: 'ARGUMENTS',
      items: positionals.flatMap(argumentItems),
    });
  }
  if (options.length) {
    sections.push({title: 'OPTIONS', items: options.flatMap(argumentItems)});
  }

  const exits = command.exits ?? [];
  if (exits.length) {
    sections.push({
      title: 'EXIT STATUS',
      items: exits.map(e => ({
        label: e.max === undefined ? `${e.code}` : `${e.code}-${e.max}`,
        doc: docLines(e.doc),
      })),
    });
  }

  const envs = new Map<string, string[]>();
  args.forEach(a => {
    if ((a.kind === 'flag' || a.kind === 'option') && a.env !== undefined) {
      const doc = typeof a.env === 'string' ? undefined : a.env.doc;
      envs.set(envVar(a.env), docLines(doc));
    }
  });
  (command.envs ?? []).forEach(e => {
    if (!envs.has(e.var)) envs.set(e.var, docLines(e.doc));
  });
  if (envs.size) {
    sections.push({
      title: 'ENVIRONMENT',
      items: [...envs].map(([label, doc]) => ({label, doc})),
    });
  }

  if (command === root && root.version) {
    sections.push({title: 'VERSION', lines: [root.version]});
  }
  return sections;
}

/** Plain text help, one blank line between sections */
export const usageText: UsageRenderer = (root, commandPath) =>
  usageSections(root, commandPath)
    .map(section => {
      const body = (section.lines ?? []).map(line => INDENT + line);
      (section.items ?? []).forEach(item => {
        body.push(INDENT + item.label);
        item.doc.forEach(line => body.push(DOC_INDENT + line));
      });
      return [section.title, ...body].join('\n');
    })
    .join('\n\n') + '\n';

function roffEscape(text: string): string {
  return text.replace(/\\/g, '\\e').replace(/-/g, '\\-');
}

/** Man page source (roff) for the same sections */
export const manText: UsageRenderer = (root, commandPath) => {
  const {names} = resolveCommand(root, commandPath);
  const out = [`.TH ${names.join('-').toUpperCase()} 1`];
  usageSections(root, commandPath).forEach(section => {
    out.push(`.SH ${section.title}`);
    (section.lines ?? []).forEach(line => out.push(roffEscape(line)));
    (section.items ?? []).forEach(item => {
      out.push('.TP', `.B ${roffEscape(item.label)}`);
      item.doc.forEach(line => out.push(roffEscape(line)));
    });
  });
  return out.join('\n') + '\n';
};

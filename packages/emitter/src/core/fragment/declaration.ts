/**
 * Type declaration rendering
 *
 * alias:   type Base = string
 * typed:   class Base wrapping the value
 * generic: class Base<T> whose phantom member carries the field type
 */

import type { Style } from "@fieldgen/frontend";
import { INDENT } from "../../constants.js";

export type DeclarationOptions = {
  readonly baseName: string;
  readonly recordName: string;
  readonly style: Exclude<Style, "none">;
  readonly exported: boolean;
  /** Values for the `all()` helper, when enumerating */
  readonly values?: readonly string[];
};

export const renderValueList = (values: readonly string[]): string =>
  `[${values.map((value) => JSON.stringify(value)).join(", ")}]`;

const renderAllMethod = (
  recordName: string,
  values: readonly string[]
): readonly string[] => [
  `${INDENT}/** Every value generated from ${recordName}, in field order */`,
  `${INDENT}all(): readonly string[] {`,
  `${INDENT}${INDENT}return ${renderValueList(values)};`,
  `${INDENT}}`,
];

const renderClass = (options: DeclarationOptions): readonly string[] => {
  const generic = options.style === "generic";
  const keyword = options.exported ? "export class" : "class";

  const members: (readonly string[])[] = [
    ...(generic ? [[`${INDENT}protected declare readonly __type?: T;`]] : []),
    [`${INDENT}constructor(readonly value: string) {}`],
    [
      `${INDENT}toString(): string {`,
      `${INDENT}${INDENT}return this.value;`,
      `${INDENT}}`,
    ],
    ...(options.values ? [renderAllMethod(options.recordName, options.values)] : []),
  ];

  return [
    `${keyword} ${options.baseName}${generic ? "<T>" : ""} {`,
    ...members.flatMap((member, index) =>
      index === 0 ? member : ["", ...member]
    ),
    "}",
  ];
};

export const renderTypeDeclaration = (
  options: DeclarationOptions
): readonly string[] => {
  const doc = `/** ${options.baseName} is a strong type generated from ${options.recordName}. Its related constants use it. */`;

  if (options.style === "alias") {
    const keyword = options.exported ? "export type" : "type";
    return [doc, `${keyword} ${options.baseName} = string;`];
  }

  return [doc, ...renderClass(options)];
};

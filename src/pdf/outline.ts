import {
  PDFArray,
  PDFContext,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFObject,
  PDFRef,
  PDFString,
} from 'pdf-lib';

/** Maps a page of a chapter document to its copy in the merged document. */
export type PageRefMap = Map<PDFRef, PDFRef>;

type DestinationName = PDFName | PDFString | PDFHexString;

interface NamedDestination {
  /** The name as the chapter wrote it, so links keep matching it byte for byte. */
  key: DestinationName;
  dest: PDFArray;
}

export interface OutlineEntry {
  title: PDFString | PDFHexString;
  /** Explicit destination, already pointing at a page of the merged document. */
  dest?: PDFArray | undefined;
  children: OutlineEntry[];
}

const OUTLINES = PDFName.of('Outlines');
const FIRST = PDFName.of('First');
const NEXT = PDFName.of('Next');
const NAMES = PDFName.of('Names');
const DESTS = PDFName.of('Dests');
const KIDS = PDFName.of('Kids');

/**
 * Collects book navigation from chapter documents and writes it into the
 * merged document: the bookmark outline, and the named destinations that
 * internal links point at. Page references are rewritten to the copied pages.
 */
export class OutlineCollector {
  private readonly entries: OutlineEntry[] = [];
  private readonly names = new Map<string, NamedDestination>();

  constructor(private readonly output: PDFDocument) {}

  add(source: PDFDocument, pages: PageRefMap): void {
    const named = namedDestinations(source);

    const outlines = source.catalog.lookupMaybe(OUTLINES, PDFDict);
    if (outlines) {
      this.entries.push(...this.readItems(outlines, named, pages));
    }

    for (const [name, { key, dest }] of named) {
      const remapped = this.remap(dest, pages);
      // The first chapter to define a name keeps it
      if (remapped && !this.names.has(name)) {
        this.names.set(name, { key, dest: remapped });
      }
    }
  }

  write(): void {
    const context = this.output.context;

    if (this.entries.length > 0) {
      const rootRef = context.nextRef();
      const items = writeItems(context, rootRef, this.entries);
      context.assign(
        rootRef,
        context.obj({ Type: 'Outlines', First: items.first, Last: items.last, Count: items.count }),
      );
      this.output.catalog.set(OUTLINES, rootRef);
    }

    const sorted = [...this.names.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const dests = PDFDict.withContext(context);
    const flat = PDFArray.withContext(context);

    for (const [, { key, dest }] of sorted) {
      if (key instanceof PDFName) {
        dests.set(key, dest);
      } else {
        flat.push(key);
        flat.push(dest);
      }
    }

    if (dests.keys().length > 0) {
      this.output.catalog.set(DESTS, context.register(dests));
    }
    if (flat.size() > 0) {
      const tree = context.obj({ Dests: context.register(context.obj({ Names: flat })) });
      this.output.catalog.set(NAMES, context.register(tree));
    }
  }

  private readItems(parent: PDFDict, named: Map<string, NamedDestination>, pages: PageRefMap): OutlineEntry[] {
    const entries: OutlineEntry[] = [];
    const visited = new Set<PDFDict>();
    let item = parent.lookupMaybe(FIRST, PDFDict);

    while (item && !visited.has(item)) {
      visited.add(item);
      const dest = resolveDestination(item, named);
      entries.push({
        title: item.lookupMaybe(PDFName.of('Title'), PDFString, PDFHexString) ?? PDFHexString.fromText(''),
        dest: dest ? this.remap(dest, pages) : undefined,
        children: this.readItems(item, named, pages),
      });
      item = item.lookupMaybe(NEXT, PDFDict);
    }

    return entries;
  }

  /** Copies `[page /XYZ left top zoom]` with the page swapped for its copy. */
  private remap(dest: PDFArray, pages: PageRefMap): PDFArray | undefined {
    const page = dest.get(0);
    const copy = page instanceof PDFRef ? pages.get(page) : undefined;
    if (!copy) {
      return undefined;
    }

    const remapped = PDFArray.withContext(this.output.context);
    remapped.push(copy);
    for (const element of dest.asArray().slice(1)) {
      remapped.push(element instanceof PDFRef ? PDFNull : element);
    }
    return remapped;
  }
}

function writeItems(
  context: PDFContext,
  parentRef: PDFRef,
  entries: OutlineEntry[],
): { first: PDFRef; last: PDFRef; count: number } {
  const items = entries.map((entry) => ({ entry, ref: context.nextRef() }));
  let count = 0;

  items.forEach(({ entry, ref }, index) => {
    const dict = context.obj({ Title: entry.title, Parent: parentRef });
    if (entry.dest) {
      dict.set(PDFName.of('Dest'), entry.dest);
    }

    const previous = items[index - 1];
    const next = items[index + 1];
    if (previous) dict.set(PDFName.of('Prev'), previous.ref);
    if (next) dict.set(NEXT, next.ref);

    if (entry.children.length > 0) {
      const children = writeItems(context, ref, entry.children);
      dict.set(FIRST, children.first);
      dict.set(PDFName.of('Last'), children.last);
      dict.set(PDFName.of('Count'), context.obj(children.count));
      count += children.count;
    }

    context.assign(ref, dict);
    count += 1;
  });

  const first = items[0];
  const last = items[items.length - 1];
  if (!first || !last) {
    throw new Error('Cannot write an empty outline level');
  }
  return { first: first.ref, last: last.ref, count };
}

function resolveDestination(item: PDFDict, named: Map<string, NamedDestination>): PDFArray | undefined {
  const action = item.lookupMaybe(PDFName.of('A'), PDFDict);
  const dest = item.lookup(PDFName.of('Dest')) ?? action?.lookup(PDFName.of('D'));

  if (dest instanceof PDFArray) {
    return dest;
  }
  if (dest instanceof PDFName || dest instanceof PDFString || dest instanceof PDFHexString) {
    return named.get(dest.decodeText())?.dest;
  }
  return undefined;
}

/** Named destinations from both the catalog `/Dests` dictionary and the `/Names` tree. */
function namedDestinations(source: PDFDocument): Map<string, NamedDestination> {
  const found = new Map<string, NamedDestination>();

  const dests = source.catalog.lookupMaybe(DESTS, PDFDict);
  for (const [key, value] of dests?.entries() ?? []) {
    const dest = explicitDestination(source.context.lookup(value));
    if (dest) {
      found.set(key.decodeText(), { key, dest });
    }
  }

  const tree = source.catalog.lookupMaybe(NAMES, PDFDict)?.lookupMaybe(DESTS, PDFDict);
  if (tree) {
    collectNameTree(tree, found, new Set());
  }

  return found;
}

function collectNameTree(node: PDFDict, found: Map<string, NamedDestination>, visited: Set<PDFDict>): void {
  if (visited.has(node)) {
    return;
  }
  visited.add(node);

  const names = node.lookupMaybe(NAMES, PDFArray);
  if (names) {
    for (let index = 0; index + 1 < names.size(); index += 2) {
      const key = names.lookup(index);
      const dest = explicitDestination(names.lookup(index + 1));
      if ((key instanceof PDFString || key instanceof PDFHexString) && dest) {
        found.set(key.decodeText(), { key, dest });
      }
    }
  }

  const kids = node.lookupMaybe(KIDS, PDFArray);
  if (kids) {
    for (let index = 0; index < kids.size(); index++) {
      const kid = kids.lookup(index);
      if (kid instanceof PDFDict) {
        collectNameTree(kid, found, visited);
      }
    }
  }
}

function explicitDestination(value: PDFObject | undefined): PDFArray | undefined {
  if (value instanceof PDFArray) {
    return value;
  }
  if (value instanceof PDFDict) {
    return value.lookupMaybe(PDFName.of('D'), PDFArray);
  }
  return undefined;
}

export interface NotebookCell {
  cell_type: "markdown" | "code";
  metadata: Record<string, never>;
  source: string[];
  execution_count?: null;
  outputs?: [];
}

export interface Notebook {
  cells: NotebookCell[];
  metadata: {
    kernelspec: { display_name: string; language: string; name: string };
  };
  nbformat: 4;
  nbformat_minor: 4;
}

/** Split into lines, each keeping its trailing newline. */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Wrap an assembled artifact, unmodified, as the single code cell of a notebook
 * between a markdown title cell and a markdown cell echoing the banner.
 */
export function packageNotebook(code: string, title: string, banner: string): Notebook {
  const bannerText = banner.endsWith("\n") ? banner : banner + "\n";
  return {
    cells: [
      { cell_type: "markdown", metadata: {}, source: [`## ${title}\n`] },
      {
        cell_type: "code",
        metadata: {},
        source: splitLinesKeepEnds(code),
        execution_count: null,
        outputs: [],
      },
      { cell_type: "markdown", metadata: {}, source: ["```\n", ...splitLinesKeepEnds(bannerText), "```\n"] },
    ],
    metadata: {
      kernelspec: { display_name: "Python 3", language: "python", name: "python3" },
    },
    nbformat: 4,
    nbformat_minor: 4,
  };
}

export function serializeNotebook(notebook: Notebook): string {
  return JSON.stringify(notebook, null, 2) + "\n";
}

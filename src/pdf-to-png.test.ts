import { join, resolve } from "node:path";
import { describe, expect, it, vi } from "vitest";

import { buildPdftoppmArgs, getPageImagePrefix, renderPdfPage } from "./pdf-to-png.ts";

type Dependencies = NonNullable<Parameters<typeof renderPdfPage>[1]>;

describe("buildPdftoppmArgs", () => {
  it("renders a single page to one unsuffixed png", () => {
    expect(buildPdftoppmArgs("/tmp/deck.pdf", "/tmp/pages/page-1", 150)).toEqual([
      "-r",
      "150",
      "-f",
      "1",
      "-l",
      "1",
      "-singlefile",
      "-png",
      "/tmp/deck.pdf",
      "/tmp/pages/page-1",
    ]);
  });

  it("selects the requested page", () => {
    expect(buildPdftoppmArgs("/tmp/deck.pdf", "/tmp/pages/page-4", 300, 4).slice(0, 6)).toEqual([
      "-r",
      "300",
      "-f",
      "4",
      "-l",
      "4",
    ]);
  });
});

describe("renderPdfPage", () => {
  it("returns the path of the rendered page image", async () => {
    const observedArgs: string[][] = [];
    const dependencies = createDependencies({
      runPdftoppm: async (args: string[]) => {
        observedArgs.push(args);
      },
      readOutputDir: async () => ["page-1.png"],
    });

    const imagePath = await renderPdfPage(
      { inputPdfPath: "/tmp/work/document.pdf", outputDirPath: "/tmp/work/pages", dpi: 200 },
      dependencies,
    );

    const resolvedOutput = resolve("/tmp/work/pages");
    expect(observedArgs).toEqual([
      buildPdftoppmArgs(
        resolve("/tmp/work/document.pdf"),
        join(resolvedOutput, getPageImagePrefix(1)),
        200,
        1,
      ),
    ]);
    expect(imagePath).toBe(join(resolvedOutput, "page-1.png"));
  });

  it("ignores other files left in the output directory", async () => {
    const dependencies = createDependencies({
      readOutputDir: async () => ["page-1.png", "page-3.png", "notes.txt"],
    });

    await expect(
      renderPdfPage(
        { inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages", pageNumber: 3 },
        dependencies,
      ),
    ).resolves.toBe(join(resolve("/tmp/pages"), "page-3.png"));
  });

  it("throws when dpi is invalid", async () => {
    await expect(
      renderPdfPage(
        { inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages", dpi: 72.5 },
        createDependencies(),
      ),
    ).rejects.toThrow("DPI must be a positive integer.");
  });

  it("throws when the page number is invalid", async () => {
    await expect(
      renderPdfPage(
        { inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages", pageNumber: 0 },
        createDependencies(),
      ),
    ).rejects.toThrow("Page number must be a positive integer.");
  });

  it("throws when the input pdf is not readable", async () => {
    const runPdftoppm = vi.fn(async () => {});
    const dependencies = createDependencies({
      assertReadableFile: async () => {
        throw new Error("Cannot read input PDF: /tmp/missing.pdf");
      },
      runPdftoppm,
    });

    await expect(
      renderPdfPage({ inputPdfPath: "/tmp/missing.pdf", outputDirPath: "/tmp/pages" }, dependencies),
    ).rejects.toThrow("Cannot read input PDF: /tmp/missing.pdf");
    expect(runPdftoppm).not.toHaveBeenCalled();
  });

  it("throws when the page image is missing after rendering", async () => {
    const dependencies = createDependencies({
      readOutputDir: async () => ["page-1-1.png"],
    });

    await expect(
      renderPdfPage({ inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages" }, dependencies),
    ).rejects.toThrow("pdftoppm did not render page 1 of the PDF.");
  });

  it("throws a clear error when pdftoppm is not installed", async () => {
    const dependencies = createDependencies({
      runPdftoppm: async () => {
        const error = new Error("spawn pdftoppm ENOENT") as NodeJS.ErrnoException;
        error.code = "ENOENT";
        throw error;
      },
    });

    await expect(
      renderPdfPage({ inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages" }, dependencies),
    ).rejects.toThrow(
      "pdftoppm command not found. Install poppler to enable PDF to PNG conversion.",
    );
  });

  it("includes stderr from pdftoppm failures", async () => {
    const dependencies = createDependencies({
      runPdftoppm: async () => {
        const error = new Error("Command failed") as NodeJS.ErrnoException & { stderr?: string };
        error.stderr = "Syntax Error: Couldn't find trailer dictionary\n";
        throw error;
      },
    });

    await expect(
      renderPdfPage({ inputPdfPath: "/tmp/deck.pdf", outputDirPath: "/tmp/pages" }, dependencies),
    ).rejects.toThrow("Failed to convert PDF to PNG: Syntax Error: Couldn't find trailer dictionary");
  });

  it("runs pdftoppm through node when no custom dependency is provided", async () => {
    vi.resetModules();

    const accessMock = vi.fn(async () => {});
    const mkdirMock = vi.fn(async () => {});
    const readdirMock = vi.fn(async () => ["page-1.png"]);
    const execFileMock = vi.fn((...args: unknown[]) => {
      const callback = args[2] as (error: Error | null, stdout: string, stderr: string) => void;
      callback(null, "", "");
    });

    vi.doMock("node:fs/promises", () => ({
      access: accessMock,
      mkdir: mkdirMock,
      readdir: readdirMock,
      readFile: vi.fn(),
    }));
    vi.doMock("node:child_process", () => ({
      execFile: execFileMock,
    }));

    try {
      const module = await import("./pdf-to-png.ts");
      const imagePath = await module.renderPdfPage({
        inputPdfPath: "/tmp/input.pdf",
        outputDirPath: "/tmp/output",
      });

      const resolvedOutputDir = resolve("/tmp/output");
      const resolvedInputPdf = resolve("/tmp/input.pdf");
      expect(accessMock).toHaveBeenCalledWith(resolvedInputPdf, expect.any(Number));
      expect(mkdirMock).toHaveBeenCalledWith(resolvedOutputDir, { recursive: true });
      expect(execFileMock).toHaveBeenCalledWith(
        "pdftoppm",
        [
          "-r",
          "300",
          "-f",
          "1",
          "-l",
          "1",
          "-singlefile",
          "-png",
          resolvedInputPdf,
          join(resolvedOutputDir, "page-1"),
        ],
        expect.any(Function),
      );
      expect(readdirMock).toHaveBeenCalledWith(resolvedOutputDir);
      expect(imagePath).toBe(join(resolvedOutputDir, "page-1.png"));
    } finally {
      vi.doUnmock("node:fs/promises");
      vi.doUnmock("node:child_process");
    }
  });
});

function createDependencies(overrides: Partial<Dependencies> = {}): Dependencies {
  return {
    assertReadableFile: vi.fn(async () => {}),
    ensureOutputDir: vi.fn(async () => {}),
    runPdftoppm: vi.fn(async () => {}),
    readOutputDir: vi.fn(async () => ["page-1.png"]),
    ...overrides,
  };
}

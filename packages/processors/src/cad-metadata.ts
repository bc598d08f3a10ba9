export type CadFormat = "dwg" | "dxf" | "step" | "iges";

export interface CadFormatInfo {
  label: string;
  formatCategory: "2D_Drawing" | "3D_Model";
  viewerRecommendation: string;
}

export const CAD_FORMATS: Readonly<Record<CadFormat, CadFormatInfo>> = {
  dwg: {
    label: "AutoCAD Drawing",
    formatCategory: "2D_Drawing",
    viewerRecommendation: "AutoCAD, FreeCAD, or online DWG viewers",
  },
  dxf: {
    label: "Drawing Exchange Format",
    formatCategory: "2D_Drawing",
    viewerRecommendation: "AutoCAD, FreeCAD, or online DWG viewers",
  },
  step: {
    label: "STEP 3D Model",
    formatCategory: "3D_Model",
    viewerRecommendation: "FreeCAD, OpenCASCADE, or 3D viewers",
  },
  iges: {
    label: "IGES 3D Model",
    formatCategory: "3D_Model",
    viewerRecommendation: "FreeCAD, OpenCASCADE, or 3D viewers",
  },
};

const DWG_RELEASES: Readonly<Record<string, string>> = {
  AC1012: "AutoCAD R13",
  AC1014: "AutoCAD R14",
  AC1015: "AutoCAD 2000",
  AC1018: "AutoCAD 2004",
  AC1021: "AutoCAD 2007",
  AC1024: "AutoCAD 2010",
  AC1027: "AutoCAD 2013",
  AC1032: "AutoCAD 2018",
};

export interface TitleBlock {
  drawingNumber?: string;
  revision?: string;
  scale?: string;
  title?: string;
  version?: string;
  release?: string;
  description?: string;
}

const TITLE_BLOCK_TAGS: Readonly<Record<string, keyof TitleBlock>> = {
  DWGNO: "drawingNumber",
  DWG_NO: "drawingNumber",
  DRAWINGNO: "drawingNumber",
  DRAWING_NO: "drawingNumber",
  DRAWING_NUMBER: "drawingNumber",
  REV: "revision",
  REVISION: "revision",
  SCALE: "scale",
  TITLE: "title",
  DRAWING_TITLE: "title",
};

export function formatFor(filename: string, mimeType: string): CadFormat | null {
  const ext = filename.slice(filename.lastIndexOf(".") + 1).toLowerCase();
  if (ext === "dwg" || ext === "dxf") return ext;
  if (ext === "step" || ext === "stp") return "step";
  if (ext === "iges" || ext === "igs") return "iges";
  if (mimeType.includes("dwg") || mimeType === "application/acad") return "dwg";
  if (mimeType.includes("dxf")) return "dxf";
  if (mimeType.includes("step")) return "step";
  if (mimeType.includes("iges")) return "iges";
  return null;
}

function latin1(bytes: Uint8Array, end = bytes.length): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1", 0, end);
}

/**
 * Reads header variables and title-block ATTRIB values from an ASCII DXF.
 * Geometry is never interpreted.
 */
export function readDxf(bytes: Uint8Array): TitleBlock {
  const lines = latin1(bytes).split(/\r?\n/);
  const block: TitleBlock = {};
  let entity = "";
  let tag = "";
  let value = "";

  const flush = () => {
    const field = TITLE_BLOCK_TAGS[tag.toUpperCase()];
    if (entity === "ATTRIB" && field && value && block[field] === undefined) {
      block[field] = value;
    }
    tag = "";
    value = "";
  };

  for (let i = 0; i + 1 < lines.length; i += 2) {
    const code = (lines[i] ?? "").trim();
    const data = (lines[i + 1] ?? "").trim();

    if (code === "0") {
      flush();
      entity = data;
    } else if (code === "9" && data === "$ACADVER") {
      const next = (lines[i + 3] ?? "").trim();
      if (next) block.version = next;
    } else if (entity === "ATTRIB" && code === "2") {
      tag = data;
    } else if (entity === "ATTRIB" && code === "1") {
      value = data;
    }
  }
  flush();

  if (block.version) {
    const release = DWG_RELEASES[block.version];
    if (release) block.release = release;
  }
  return block;
}

/** Version string from the first six bytes of a binary DWG. */
export function readDwg(bytes: Uint8Array): TitleBlock {
  const version = latin1(bytes, Math.min(6, bytes.length));
  if (!/^AC\d{4}$/.test(version)) return {};
  const release = DWG_RELEASES[version];
  return release ? { version, release } : { version };
}

function stepStrings(args: string): string[] {
  return [...args.matchAll(/'((?:[^']|'')*)'/g)].map((m) => (m[1] ?? "").replace(/''/g, "'"));
}

/** FILE_NAME and FILE_DESCRIPTION entries of a STEP header section. */
export function readStep(bytes: Uint8Array): TitleBlock {
  const header = latin1(bytes, Math.min(bytes.length, 64 * 1024));
  const block: TitleBlock = {};

  const name = /FILE_NAME\s*\(([\s\S]*?)\);/.exec(header);
  const nameArgs = name?.[1];
  if (nameArgs) {
    const title = stepStrings(nameArgs)[0];
    if (title) block.title = title;
  }

  const description = /FILE_DESCRIPTION\s*\(([\s\S]*?)\);/.exec(header);
  const descArgs = description?.[1];
  if (descArgs) {
    const text = stepStrings(descArgs)[0];
    if (text) block.description = text;
  }

  const schema = /FILE_SCHEMA\s*\(\s*\(\s*'([^']*)'/.exec(header);
  if (schema?.[1]) block.version = schema[1];
  return block;
}

/** Start-section lines (column 73 = 'S') of an IGES file. */
export function readIges(bytes: Uint8Array): TitleBlock {
  const lines = latin1(bytes, Math.min(bytes.length, 16 * 1024)).split(/\r?\n/);
  const start = lines
    .filter((l) => l.length >= 73 && l[72] === "S")
    .map((l) => l.slice(0, 72).trim())
    .filter((l) => l.length > 0)
    .join(" ");
  return start ? { description: start } : {};
}

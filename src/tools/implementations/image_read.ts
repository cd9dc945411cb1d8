/**
 * 讀取圖片工具：只檢查擴展名和大小，字節原樣傳給調用方
 */

import fs from "fs/promises";
import path from "path";
import type { Stats } from "fs";
import { ToolExecutionError } from "../errors.js";
import type { ImageRead } from "../schemas.js";
import { IMAGE_FORMATS } from "../types.js";
import type {
  BuiltInToolHandler,
  ImageBlock,
  ImageFormat,
  ToolExecutionContext,
  ToolExecutionOutputItem,
} from "../types.js";
import { canonicalizePath } from "../../utils/path.js";
import type { Platform } from "../../utils/platform.js";

/** 10 MiB */
export const MAX_IMAGE_SIZE_BYTES = 10 * 1024 * 1024;

const IMAGE_READ_TOOL_DESCRIPTION = `
A tool for reading images.

WHEN TO USE THIS TOOL:
- Use when you want to read a file that you know is a supported image

HOW TO USE:
- Provide a list of paths to images you want to read

FEATURES:
- Able to read the following image formats: {IMAGE_FORMATS}
- Can read multiple images in one go

LIMITATIONS:
- Maximum supported image size is 10 MB
`;

const IMAGE_READ_SCHEMA = {
  type: "object",
  properties: {
    paths: {
      type: "array",
      description: "List of paths to images to read",
      items: {
        type: "string",
        description: "Path to an image",
      },
    },
  },
  required: ["paths"],
};

/**
 * 由擴展名得到圖片格式（大小寫不敏感，jpg 視為 jpeg）
 */
export function imageFormatFromExtension(extension: string): ImageFormat | undefined {
  const ext = extension.replace(/^\./, "").toLowerCase();
  if (ext === "jpg") return "jpeg";
  return IMAGE_FORMATS.find((format) => format === ext);
}

export function isSupportedImageType(filePath: string): boolean {
  return imageFormatFromExtension(path.extname(filePath)) !== undefined;
}

const MAC_SCREENSHOT = /Screenshot \d{4}-\d{2}-\d{2} at \d{1,2}\.\d{2}\.\d{2} [AP]M/;

/**
 * macOS 截圖的文件名在時間和 AM/PM 之間用的是窄不換行空格（U+202F），
 * 模型給回來的路徑卻是普通空格，例如 `Screenshot 2025-03-13 at 1.46.32 PM.png`。
 */
export function preProcessImagePath(filePath: string, platform: Pick<Platform, "fixesScreenshotPaths">): string {
  if (!platform.fixesScreenshotPaths || !filePath.includes("Screenshot")) {
    return filePath;
  }
  if (!MAC_SCREENSHOT.test(filePath)) {
    return filePath;
  }
  const pos = filePath.indexOf(" at ");
  if (pos === -1) {
    return filePath;
  }
  return filePath.slice(0, pos + 4) + filePath.slice(pos + 4).replace(/ /g, "\u202F");
}

function processedPaths(args: ImageRead, ctx: ToolExecutionContext): string[] {
  return args.paths.map((p) => {
    let resolved: string;
    try {
      resolved = canonicalizePath(p, ctx.provider);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`failed to process path ${p}: ${message}`);
    }
    return preProcessImagePath(resolved, ctx.platform);
  });
}

/**
 * 讀取一張圖片，格式不支持或超過大小限制時返回可讀的錯誤信息
 */
export async function readImage(filePath: string): Promise<ImageBlock> {
  const extension = path.extname(filePath);
  if (!extension) {
    throw new Error("missing extension");
  }
  const format = imageFormatFromExtension(extension);
  if (!format) {
    throw new Error(`unsupported format: ${extension.slice(1).toLowerCase()}`);
  }

  let size: number;
  try {
    size = (await fs.lstat(filePath)).size;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to read file metadata for ${filePath}: ${message}`);
  }
  if (size > MAX_IMAGE_SIZE_BYTES) {
    throw new Error(
      `image at ${filePath} has size ${size} bytes, but the max supported size is ${MAX_IMAGE_SIZE_BYTES}`
    );
  }

  try {
    const bytes = await fs.readFile(filePath);
    return { format, source: { type: "bytes", bytes } };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to read image at ${filePath}: ${message}`);
  }
}

export const imageReadTool: BuiltInToolHandler<ImageRead> = {
  name: "imageRead",

  spec() {
    return {
      name: "imageRead",
      description: IMAGE_READ_TOOL_DESCRIPTION.replace("{IMAGE_FORMATS}", IMAGE_FORMATS.join(", ")),
      inputSchema: IMAGE_READ_SCHEMA,
    };
  },

  async validate(args, ctx) {
    let paths: string[];
    try {
      paths = processedPaths(args, ctx);
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }

    // 收集所有路徑的問題一起返回
    const errors: string[] = [];
    if (paths.length === 0) {
      errors.push("At least one image path must be provided");
    }
    for (const p of paths) {
      if (!isSupportedImageType(p)) {
        errors.push(`'${p}' is not a supported image type`);
        continue;
      }

      let stats: Stats;
      try {
        stats = await fs.lstat(p);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(`failed to read file metadata for path ${p}: ${message}`);
        continue;
      }

      if (!stats.isFile()) {
        errors.push(`'${p}' is not a file`);
        continue;
      }
      if (stats.size > MAX_IMAGE_SIZE_BYTES) {
        errors.push(
          `'${p}' has size ${stats.size} which is greater than the max supported size of ${MAX_IMAGE_SIZE_BYTES}`
        );
      }
    }

    return errors.length > 0 ? errors.join("\n") : null;
  },

  async execute(args, ctx) {
    let paths: string[];
    try {
      paths = processedPaths(args, ctx);
    } catch (error) {
      throw ToolExecutionError.custom(error instanceof Error ? error.message : String(error));
    }

    const items: ToolExecutionOutputItem[] = [];
    const errors: string[] = [];
    for (const p of paths) {
      try {
        items.push({ type: "image", image: await readImage(p) });
      } catch (error) {
        // 通常是校驗之後文件被刪除或替換
        errors.push(error instanceof Error ? error.message : String(error));
      }
    }

    if (errors.length > 0) {
      throw ToolExecutionError.custom(errors.join("\n"));
    }
    return { items };
  },
};

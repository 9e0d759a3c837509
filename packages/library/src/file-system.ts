import * as uniFs from "@webfold/uni-fs";

import type { FileSystem } from "./types";

export const nodeFileSystem: FileSystem = {
  exists: uniFs.exists,
  readBinary: uniFs.readBinary,
  readText: uniFs.readText,
  write: uniFs.write,
  ensureDir: uniFs.ensureDir,
  list: uniFs.list,
  remove: uniFs.remove,
  removeDir: uniFs.removeDir
};

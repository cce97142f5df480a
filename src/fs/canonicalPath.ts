/**
 * Canonicalize a module path relative to the scan root.
 * - root-relative
 * - forward slashes
 * - collapse . and ..
 * - strip trailing slash
 * - DO NOT lowercase full path (Linux case-sensitive)
 */
export function canonicalPath(
  absPath: string,
  root: string,
): string {
  const norm = absPath.replace(/\\/g, "/");
  const rootNorm = root.replace(/\\/g, "/").replace(/\/+$/, "");

  let rel = norm;
  if (norm === rootNorm) {
    rel = "";
  } else if (norm.startsWith(rootNorm + "/")) {
    rel = norm.slice(rootNorm.length + 1);
  }

  const parts = rel.split("/").filter((p) => p && p !== ".");
  const out: string[] = [];

  for (const p of parts) {
    if (p === "..") {
      out.pop();
    } else {
      out.push(p);
    }
  }

  return out.join("/");
}

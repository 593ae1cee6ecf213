/**
 * Whole-file bootstrap command.
 *
 * Instead of parsing Python locally, the driver sends the interpreter one
 * command line that loads the file, splits it into top-level units with
 * the interpreter's own `ast` module, executes everything but a trailing
 * bare expression and then evaluates that expression so its value is
 * displayed. A file with no units, or whose last unit is not an
 * expression, simply executes.
 */

/**
 * Leading text of every file-load command; also recognised when stripping
 * commands back out of transcript copies
 */
export const FILE_LOAD_PREAMBLE = "import codecs, os, ast, sys;__pyfile = codecs.open(";

/**
 * Encoding declaration placed in front of multi-line payloads
 */
export const CODING_DECLARATION = "# -*- coding: utf-8 -*-";

const CODING_PATTERN = /^[ \t\f]*#.*?coding[:=][ \t]*([-_.a-zA-Z0-9]+)/;

export interface FileBootstrapOptions {
  /** File the interpreter reads */
  path: string;
  /** Name reported in tracebacks; defaults to `path` */
  displayName?: string;
  encoding?: string;
  /** Remove the file once it has been read (temporary payload files) */
  deleteAfter?: boolean;
  /** Keep `if __name__ == "__main__":` blocks */
  runMainGuard?: boolean;
}

/**
 * Quote a value as a Python triple-quoted string literal
 */
function pythonLiteral(value: string): string {
  const escaped = value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  return `'''${escaped}'''`;
}

/**
 * Encoding named by a coding declaration on one of the first two lines
 */
export function detectEncoding(source: string): string {
  const [first = "", second = ""] = source.split("\n", 2);
  const match = first.match(CODING_PATTERN) ?? second.match(CODING_PATTERN);
  return match?.[1] ?? "utf-8";
}

/**
 * Build the single-line command that runs a file in the interpreter
 */
export function buildFileBootstrap(options: FileBootstrapOptions): string {
  const file = pythonLiteral(options.path);
  const name = pythonLiteral(options.displayName ?? options.path);
  const encoding = pythonLiteral(options.encoding ?? "utf-8");
  const keepMain = options.runMainGuard ? "True" : "False";

  const isMainGuard =
    "(isinstance(__n, ast.If) and isinstance(__n.test, ast.Compare)" +
    " and isinstance(__n.test.left, ast.Name) and __n.test.left.id == '__name__'" +
    " and len(__n.test.ops) == 1 and isinstance(__n.test.ops[0], ast.Eq)" +
    " and isinstance(__n.test.comparators[0], ast.Constant)" +
    " and __n.test.comparators[0].value == '__main__')";

  return [
    `${FILE_LOAD_PREAMBLE}${file}, encoding=${encoding})`,
    `__code = __pyfile.read().encode(${encoding})`,
    "__pyfile.close()",
    ...(options.deleteAfter ? [`os.remove(${file})`] : []),
    `__tree = ast.parse(__code, ${name})`,
    `__body = [__n for __n in __tree.body if ${keepMain} or not ${isMainGuard}]`,
    "__last = __body.pop() if __body and isinstance(__body[-1], ast.Expr) else None",
    `exec(compile(ast.Module(body=__body, type_ignores=[]), ${name}, 'exec'))`,
    `sys.displayhook(eval(compile(ast.Expression(__last.value), ${name}, 'eval'))) if __last is not None else None`,
  ].join(";");
}

import path from "path";

export const REPORT_EXTENSION = ".csv";

export function projectDir(inputDir: string, project: string): string {
  return path.join(inputDir, project);
}

export function reportPath(inputDir: string, project: string, component: string): string {
  return path.join(projectDir(inputDir, project), `${component}${REPORT_EXTENSION}`);
}

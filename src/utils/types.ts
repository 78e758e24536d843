export interface LoadFileResults {
  content: string;
  format: string;
  path: string;
}

export interface Book {
  id: string;
  dir: string;
}

export interface Chapter {
  number: number;
  fileName: string;
  path: string;
}

export type TagData = {
  id: number;
  name: string;
};

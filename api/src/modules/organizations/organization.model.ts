export type Organization = {
  id: string;
  name: string;
  createdAt: string;
};

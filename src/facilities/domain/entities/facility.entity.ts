export interface Facility {
  id: number;
  code: string;
  name: string;
  createdAt: Date;
}

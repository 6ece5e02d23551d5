export interface Ingredient {
  id: number;
  name: string;
  measurement_unit: string;
}

export type PosType = 'CAFE' | 'VENDING_MACHINE' | 'BAKERY' | 'CAFETERIA';

export type CampusType = 'ALTSTADT' | 'BERGHEIM' | 'INF';

/** Point of sale that reviews are attached to */
export interface Pos {
  id: number;
  name: string;
  description: string;
  type: PosType;
  campus: CampusType;
  street: string;
  houseNumber: string;
  postalCode: number;
  city: string;
}

export interface PosStore {
  /** Rejects with NotFoundError when no POS has this id */
  getById(id: number): Promise<Pos>;
  save(pos: Pos): Promise<Pos>;
}

// src/models/umkm.types.ts

export const UMKM_COLLECTION = 'umkm';

export interface UmkmInput {
  name: string;
  contact: string;
  description: string;
  social?: string | null;
}

// Shape persisted in the `umkm` collection.
export interface Umkm {
  name: string;
  contact: string;
  description: string;
  social: string | null;
}

export interface UmkmView {
  id: string;
  name: string | null;
  contact: string | null;
  description: string | null;
  social: string | null;
}

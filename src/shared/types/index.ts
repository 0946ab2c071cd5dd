export type { Entry, Parcel } from "./parcel.types";

/**
 * Discriminator for captured clipboard entries. Only text is encrypted,
 * searched and restorable; everything else is opaque.
 */
export enum EntryType {
  Text = "text",
  Other = "other",
}

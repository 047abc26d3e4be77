/**
 * Structure Stage Input DTO
 */

/**
 * One chapter document from the Load Stage
 */
export interface StructureInputDto {
  href: string;
  html: string;
}

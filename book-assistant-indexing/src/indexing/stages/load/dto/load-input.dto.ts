/**
 * Load Stage Input DTO
 */
export interface LoadInputDto {
  filePath: string;
}

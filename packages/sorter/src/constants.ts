import {
  CategorySchema,
  ComponentRoleSchema,
  GenderSchema,
  MaskRoleSchema,
  type Category,
  type ComponentRole,
  type Gender,
  type MaskRole,
  type TransferMode
} from "@part-sorter/schema";

export interface ComponentFolderDefinition {
  role: ComponentRole;
  folderName: string;
}

export const COMPONENT_FOLDERS: readonly ComponentFolderDefinition[] = [
  { role: "FACE", folderName: "Face" },
  { role: "SV", folderName: "SV" },
  { role: "TV", folderName: "TV" },
  { role: "TVD", folderName: "TVD" },
  { role: "ICON", folderName: "Variation" }
];

export const ALL_GENDERS: readonly Gender[] = GenderSchema.options;
export const ALL_CATEGORIES: readonly Category[] = CategorySchema.options;
export const MAIN_ROLES: readonly ComponentRole[] = ComponentRoleSchema.options;
export const MASK_ROLES: readonly MaskRole[] = MaskRoleSchema.options;

// These may carry a trailing 1/2 layer suffix (Clothing1, Clothing2) that collapses into the base category.
export const LAYERED_CATEGORIES: ReadonlySet<Category> = new Set<Category>([
  "Cloak",
  "Clothing",
  "RearHair",
  "Beard",
  "FrontHair",
  "Tail",
  "Wing"
]);

export const IMAGE_FILE_REGEX = /\.(png|jpg|jpeg|webp)$/i;

export const SORT_FOLDER_NAME = "Sort";
export const MASK_FOLDER_SUFFIX = "_MASK";

export const MANIFEST_FILE_NAMES: Record<TransferMode, string> = {
  move: "manifest.json",
  copy: "copy_log.json"
};

export const ROOT_ENV_VAR = "PART_SORTER_ROOT";
export const COLLISION_ENV_VAR = "PART_SORTER_COLLISION";
export const VERBOSE_ENV_VAR = "PART_SORTER_VERBOSE";

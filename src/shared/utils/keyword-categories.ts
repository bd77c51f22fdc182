import { KeywordCategory } from "../types/keyword.types";

export function mapCategories<T>(build: (category: KeywordCategory) => T): Record<KeywordCategory, T> {
  return {
    technical_skills: build("technical_skills"),
    soft_skills: build("soft_skills"),
    certifications: build("certifications"),
    education: build("education"),
    action_verbs: build("action_verbs"),
  };
}

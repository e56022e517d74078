import type { VerifiedProfileFields } from "@/lib/db/queries/verifications";
import type { DocumentType } from "@/lib/db/schema";
import type { ExtractedDataFor } from "@/lib/identity/document/extracted-data";

type ProfileFieldMappers = {
  [K in DocumentType]: (data: ExtractedDataFor<K>) => VerifiedProfileFields;
};

const PROFILE_FIELD_MAPPERS: ProfileFieldMappers = {
  passport: (data) => ({
    verifiedFirstName: data.first_name,
    verifiedLastInitial: data.last_name.charAt(0).toUpperCase() || undefined,
    verifiedBirthDate: data.birth_date ?? undefined,
    verifiedBirthplaceCity: data.birth_place,
    verifiedNationality: data.nationality,
  }),
  residence_permit: (data) => ({
    verifiedResidenceCountry: data.country,
    verifiedResidenceStatus: data.status,
  }),
  divorce_certificate: () => ({ verifiedMaritalStatus: "divorced_once" }),
  diploma: (data) => ({ verifiedEducationLevel: data.degree }),
  employment_proof: () => ({}),
};

/**
 * Profile fields an approved document of the given type vouches for.
 * Fields the document does not carry stay undefined and are not written.
 */
export function mapToProfileFields<K extends DocumentType>(
  documentType: K,
  data: ExtractedDataFor<K>,
): VerifiedProfileFields {
  return PROFILE_FIELD_MAPPERS[documentType](data);
}

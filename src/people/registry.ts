import { v4 as uuidv4 } from "uuid";
import type { DetectedFace, Embedding, Person } from "../utils/types.js";
import { findBestMatch } from "../matching/match-finder.js";
import { averageEmbedding } from "../matching/aggregate.js";
import { peopleLogger } from "../utils/logger.js";

/**
 * In-memory bookkeeping of detected faces and the persons they belong to.
 *
 * A person's `averageEmbedding` is what new faces are matched against.
 * Stored records are replaced, never mutated, so objects handed out to
 * callers stay stable.
 */
export class PersonRegistry {
  private readonly faces = new Map<string, DetectedFace>();
  private readonly persons = new Map<string, Person>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ===========================================================================
  // Faces
  // ===========================================================================

  saveFace(face: DetectedFace): void {
    this.faces.set(face.id, face);
  }

  getFace(faceId: string): DetectedFace | null {
    return this.faces.get(faceId) ?? null;
  }

  getAllFaces(): DetectedFace[] {
    return [...this.faces.values()];
  }

  getFacesForImage(imagePath: string): DetectedFace[] {
    return this.getAllFaces().filter((f) => f.imagePath === imagePath);
  }

  getFacesForPerson(personId: string): DetectedFace[] {
    return this.getAllFaces().filter((f) => f.personId === personId);
  }

  getUnassignedFaces(): DetectedFace[] {
    return this.getAllFaces().filter((f) => f.personId === null);
  }

  deleteFace(faceId: string): void {
    this.faces.delete(faceId);
  }

  deleteFacesForImage(imagePath: string): number {
    const ids = this.getFacesForImage(imagePath).map((f) => f.id);
    for (const id of ids) {
      this.faces.delete(id);
    }
    return ids.length;
  }

  /**
   * Distinct image paths containing a person, in first-seen order.
   */
  getImagesForPerson(personId: string): string[] {
    return [...new Set(this.getFacesForPerson(personId).map((f) => f.imagePath))];
  }

  updateFacePerson(faceId: string, personId: string | null): void {
    const face = this.faces.get(faceId);
    if (face) {
      this.faces.set(faceId, { ...face, personId });
    }
  }

  getUnnamedFaceCount(): number {
    return this.getUnassignedFaces().length;
  }

  getTotalFaceCount(): number {
    return this.faces.size;
  }

  // ===========================================================================
  // Persons
  // ===========================================================================

  getAllPersons(): Person[] {
    return [...this.persons.values()];
  }

  getPerson(personId: string): Person | null {
    return this.persons.get(personId) ?? null;
  }

  getTotalPersonCount(): number {
    return this.persons.size;
  }

  /**
   * Id of the person whose average embedding best matches, or null when no
   * person reaches the similarity threshold.
   */
  findMatchingPerson(embedding: Embedding): string | null {
    const persons = this.getAllPersons();
    const match = findBestMatch(
      embedding,
      persons.map((p) => p.averageEmbedding)
    );

    if (!match) return null;

    peopleLogger.debug("Matched person", { personId: persons[match.index].id, score: match.score });
    return persons[match.index].id;
  }

  /**
   * Creates an auto-named person seeded with the face's embedding and
   * assigns the face to it.
   */
  createPersonFromFace(face: DetectedFace): Person {
    const createdAt = this.timestamp();
    const person: Person = {
      id: uuidv4(),
      name: `Person ${this.persons.size + 1}`,
      averageEmbedding: face.embedding,
      faceCount: 1,
      createdAt,
      updatedAt: createdAt,
      thumbnailPath: face.thumbnailPath ?? face.imagePath,
    };

    this.persons.set(person.id, person);
    this.faces.set(face.id, { ...face, personId: person.id });

    peopleLogger.info("Created person from face", { personId: person.id, faceId: face.id });
    return person;
  }

  /**
   * Stores the face and attaches it to the best matching person, creating a
   * new person when nobody matches. Returns the stored face.
   */
  assignFace(face: DetectedFace): DetectedFace {
    const personId = this.findMatchingPerson(face.embedding);

    if (personId === null) {
      const person = this.createPersonFromFace(face);
      return { ...face, personId: person.id };
    }

    const assigned: DetectedFace = { ...face, personId };
    this.faces.set(face.id, assigned);
    this.incrementPersonFaceCount(personId);
    return assigned;
  }

  incrementPersonFaceCount(personId: string): void {
    const person = this.persons.get(personId);
    if (person) {
      this.persons.set(personId, {
        ...person,
        faceCount: person.faceCount + 1,
        updatedAt: this.timestamp(),
      });
    }
  }

  /**
   * Creates a person from hand-picked faces. The first face seeds the
   * average embedding and thumbnail; unknown face ids are skipped.
   */
  createNamedPerson(name: string, faceIds: string[]): Person {
    const faces = faceIds
      .map((id) => this.faces.get(id))
      .filter((f): f is DetectedFace => f !== undefined);
    const firstFace = faces[0];

    const createdAt = this.timestamp();
    const person: Person = {
      id: uuidv4(),
      name,
      averageEmbedding: firstFace?.embedding ?? [],
      faceCount: faces.length,
      createdAt,
      updatedAt: createdAt,
      thumbnailPath: firstFace?.thumbnailPath,
    };

    this.persons.set(person.id, person);
    for (const face of faces) {
      this.updateFacePerson(face.id, person.id);
    }

    peopleLogger.info("Created named person", { personId: person.id, name, faces: faces.length });
    return person;
  }

  updatePersonName(personId: string, name: string): void {
    const person = this.persons.get(personId);
    if (person) {
      this.persons.set(personId, { ...person, name, updatedAt: this.timestamp() });
    }
  }

  getPersonThumbnail(personId: string): string | null {
    for (const face of this.getFacesForPerson(personId)) {
      if (face.thumbnailPath !== undefined) return face.thumbnailPath;
    }
    return null;
  }

  /**
   * Moves a face to another person and recounts both persons.
   */
  moveFaceToPerson(faceId: string, newPersonId: string): void {
    const face = this.faces.get(faceId);
    if (!face) return;

    const oldPersonId = face.personId;
    this.updateFacePerson(faceId, newPersonId);

    if (oldPersonId !== null) {
      this.updatePersonFaceCount(oldPersonId);
    }
    this.updatePersonFaceCount(newPersonId);
  }

  /**
   * Assigns several faces to an existing person. Unknown face ids are
   * skipped; persons that lose faces are recounted like the target.
   */
  assignFacesToPerson(faceIds: readonly string[], personId: string): void {
    if (!this.persons.has(personId)) {
      peopleLogger.warn("Cannot assign faces to unknown person", { personId });
      return;
    }

    const previousPersonIds = new Set<string>();
    let assigned = 0;

    for (const faceId of faceIds) {
      const face = this.faces.get(faceId);
      if (!face) continue;

      if (face.personId !== null && face.personId !== personId) {
        previousPersonIds.add(face.personId);
      }
      this.updateFacePerson(faceId, personId);
      assigned++;
    }

    if (assigned === 0) return;

    this.updatePersonFaceCount(personId);
    for (const previousPersonId of previousPersonIds) {
      this.updatePersonFaceCount(previousPersonId);
    }
  }

  /**
   * Unassigns a face. Its former person is recounted and removed once empty.
   */
  removeFaceFromPerson(faceId: string): void {
    const face = this.faces.get(faceId);
    if (!face) return;

    const oldPersonId = face.personId;
    this.updateFacePerson(faceId, null);

    if (oldPersonId !== null) {
      this.updatePersonFaceCount(oldPersonId);
    }
  }

  /**
   * Recounts a person's faces; a person left without faces is removed.
   */
  private updatePersonFaceCount(personId: string): void {
    const person = this.persons.get(personId);
    if (!person) return;

    const faceCount = this.getFacesForPerson(personId).length;

    if (faceCount === 0) {
      this.persons.delete(personId);
      peopleLogger.info("Removed empty person", { personId });
      return;
    }

    this.persons.set(personId, {
      ...person,
      faceCount,
      thumbnailPath: person.thumbnailPath ?? this.getPersonThumbnail(personId) ?? undefined,
      updatedAt: this.timestamp(),
    });
  }

  /**
   * Folds `mergePersonId` into `keepPersonId`: its faces are reassigned and
   * the kept person's average is recomputed over all of its faces.
   */
  mergePersons(keepPersonId: string, mergePersonId: string): void {
    const keepPerson = this.persons.get(keepPersonId);
    const mergePerson = this.persons.get(mergePersonId);

    if (!keepPerson || !mergePerson || keepPersonId === mergePersonId) return;

    for (const face of this.getFacesForPerson(mergePersonId)) {
      this.faces.set(face.id, { ...face, personId: keepPersonId });
    }

    const allFaces = this.getFacesForPerson(keepPersonId);
    if (allFaces.length > 0) {
      this.persons.set(keepPersonId, {
        ...keepPerson,
        averageEmbedding: averageEmbedding(allFaces.map((f) => f.embedding)),
        faceCount: allFaces.length,
        updatedAt: this.timestamp(),
      });
    }

    this.persons.delete(mergePersonId);
    peopleLogger.info("Merged persons", { keepPersonId, mergePersonId, faces: allFaces.length });
  }

  /**
   * Deletes a person; its faces become unassigned.
   */
  deletePerson(personId: string): void {
    for (const face of this.getFacesForPerson(personId)) {
      this.faces.set(face.id, { ...face, personId: null });
    }
    this.persons.delete(personId);
  }

  clearAll(): void {
    this.faces.clear();
    this.persons.clear();
  }

  /**
   * Case-insensitive substring search. An empty query matches nothing.
   */
  searchPersonsByName(query: string): Person[] {
    if (query.length === 0) return [];

    const lowerQuery = query.toLowerCase();
    return this.getAllPersons().filter((p) => p.name.toLowerCase().includes(lowerQuery));
  }
}

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MedicalDocument } from './entities/MedicalDocument';
import { ExtractedFields, NOT_AVAILABLE } from './extraction/document-fields';

export interface NewDocument {
  filename: string;
  fields: ExtractedFields;
  content: string;
}

/** Row shape of `GET /documents/`. */
export interface DocumentListRow {
  id: number;
  filename: string;
  category: string;
  document_date: string;
  doctor_name: string;
  hospital_name: string;
  summary: string;
}

export interface SearchableDocument {
  filename: string;
  content: string;
  summary: string;
  category: string;
}

/**
 * Dated documents first, newest first; `N/A` dates last.
 * Dates compare as strings, which orders `YYYY-MM-DD` chronologically.
 */
export function compareByDocumentDate(a: { document_date: string }, b: { document_date: string }): number {
  const aUnknown = a.document_date === NOT_AVAILABLE;
  const bUnknown = b.document_date === NOT_AVAILABLE;
  if (aUnknown !== bUnknown) return aUnknown ? 1 : -1;
  if (a.document_date === b.document_date) return 0;
  return a.document_date < b.document_date ? 1 : -1;
}

@Injectable()
export class DocumentStore {
  constructor(@InjectRepository(MedicalDocument) private readonly documentRepo: Repository<MedicalDocument>) {}

  async insert(doc: NewDocument): Promise<MedicalDocument> {
    const entity = this.documentRepo.create({
      filename: doc.filename,
      category: doc.fields.category,
      documentDate: doc.fields.document_date,
      doctorName: doc.fields.doctor_name,
      hospitalName: doc.fields.hospital_name,
      summary: doc.fields.summary,
      content: doc.content,
    });

    return this.documentRepo.save(entity);
  }

  async listAll(): Promise<DocumentListRow[]> {
    const rows = await this.documentRepo.find({
      select: ['id', 'filename', 'category', 'documentDate', 'doctorName', 'hospitalName', 'summary'],
      order: { id: 'ASC' },
    });

    // Array.prototype.sort is stable, so equal dates stay in insertion order.
    return rows
      .map((row) => ({
        id: row.id,
        filename: row.filename,
        category: row.category,
        document_date: row.documentDate,
        doctor_name: row.doctorName,
        hospital_name: row.hospitalName,
        summary: row.summary,
      }))
      .sort(compareByDocumentDate);
  }

  async readAllForSearch(): Promise<SearchableDocument[]> {
    const rows = await this.documentRepo.find({
      select: ['filename', 'content', 'summary', 'category'],
      order: { id: 'ASC' },
    });

    return rows.map((row) => ({
      filename: row.filename,
      content: row.content,
      summary: row.summary,
      category: row.category,
    }));
  }
}

import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

/**
 * One row per ingested file. Text columns hold the `N/A` sentinel, never NULL,
 * so that listing order can key on it.
 */
@Entity('documents')
export class MedicalDocument {
  @PrimaryGeneratedColumn('increment', { name: 'id' })
  id!: number;

  @Column({ name: 'filename', type: 'text' })
  filename!: string;

  @Column({ name: 'category', type: 'text' })
  category!: string;

  @Column({ name: 'document_date', type: 'text' })
  documentDate!: string;

  @Column({ name: 'doctor_name', type: 'text' })
  doctorName!: string;

  @Column({ name: 'hospital_name', type: 'text' })
  hospitalName!: string;

  @Column({ name: 'summary', type: 'text' })
  summary!: string;

  @Column({ name: 'content', type: 'text' })
  content!: string;
}

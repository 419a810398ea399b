import type { AppConfig } from "@/core/config/app-config";
import type { ConnectivityService } from "@/core/connectivity/connectivity-service";
import type { AppDb } from "@/core/db/app-db";
import type { ServiceLocator } from "@/core/di/service-locator";
import type { LocalizationService } from "@/core/l10n/localization-service";
import type { Logger } from "@/core/logging/logger";
import type { ApiClient } from "@/core/network/api-client";
import type { AppPref } from "@/core/storage/app-pref";
import type { EncryptionService } from "@/core/storage/encryption-service";
import type { KeyValueStorage } from "@/core/storage/key-value-storage";
import type { AppStore } from "@/features/app/app-store";
import type { AuthRemoteDataSource } from "@/features/auth/data/auth-remote-data-source";
import type { AuthRepository } from "@/features/auth/domain/auth-repository";
import type {
  IsAuthenticatedUseCase,
  LoginUseCase,
  LogoutUseCase,
  VerifyOtpUseCase,
} from "@/features/auth/domain/auth-use-cases";
import type { AuthStore } from "@/features/auth/presentation/auth-store";
import type { NoteLocalDataSource } from "@/features/notes/data/note-local-data-source";
import type { NoteRemoteDataSource } from "@/features/notes/data/note-remote-data-source";
import type { NoteRepository } from "@/features/notes/domain/note-repository";
import type { CreateNoteUseCase, GetNotesUseCase } from "@/features/notes/domain/note-use-cases";
import type { NotesStore } from "@/features/notes/presentation/notes-store";
import type { ProductLocalDataSource } from "@/features/products/data/product-local-data-source";
import type { ProductRemoteDataSource } from "@/features/products/data/product-remote-data-source";
import type { GetProductsUseCase } from "@/features/products/domain/get-products-use-case";
import type { ProductRepository } from "@/features/products/domain/product-repository";
import type { ProductsStore } from "@/features/products/presentation/products-store";
import type { TaskLocalDataSource } from "@/features/tasks/data/task-local-data-source";
import type { TaskRemoteDataSource } from "@/features/tasks/data/task-remote-data-source";
import type { TaskRepository } from "@/features/tasks/data/task-repository";
import type { TaskViewModel } from "@/features/tasks/viewmodel/task-view-model";

export interface ServiceRegistry {
  config: AppConfig;
  logger: Logger;
  apiClient: ApiClient;
  keyValueStorage: KeyValueStorage;
  encryption: EncryptionService;
  appPref: AppPref;
  db: AppDb;
  connectivity: ConnectivityService;
  localization: LocalizationService;

  appStore: AppStore;

  authRemoteDataSource: AuthRemoteDataSource;
  authRepository: AuthRepository;
  loginUseCase: LoginUseCase;
  verifyOtpUseCase: VerifyOtpUseCase;
  logoutUseCase: LogoutUseCase;
  isAuthenticatedUseCase: IsAuthenticatedUseCase;
  authStore: AuthStore;

  productRemoteDataSource: ProductRemoteDataSource;
  productLocalDataSource: ProductLocalDataSource;
  productRepository: ProductRepository;
  getProductsUseCase: GetProductsUseCase;
  productsStore: ProductsStore;

  taskRemoteDataSource: TaskRemoteDataSource;
  taskLocalDataSource: TaskLocalDataSource;
  taskRepository: TaskRepository;
  taskViewModel: TaskViewModel;

  noteRemoteDataSource: NoteRemoteDataSource;
  noteLocalDataSource: NoteLocalDataSource;
  noteRepository: NoteRepository;
  getNotesUseCase: GetNotesUseCase;
  createNoteUseCase: CreateNoteUseCase;
  notesStore: NotesStore;
}

export type Locator = ServiceLocator<ServiceRegistry>;

export interface Item {
  id: number;
  title: string;
  description: string;
  status: string;
  created_at: string;
  updated_at?: string;
}

export interface ItemCreate {
  title: string;
  description?: string;
  status?: string;
}

// Absent keys are left untouched on update.
export interface ItemUpdate {
  title?: string;
  description?: string;
  status?: string;
}

export interface Paging {
  page: number;
  limit: number;
  total: number;
}

export interface ApiResponse<T> {
  data: T;
  message?: string;
  paging?: Paging;
}

export interface ApiError {
  error: string;
}
